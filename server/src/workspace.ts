import path from 'node:path';
import { analyzeTree } from './analysis';
import type { FileFacts, PlayerStart } from './analysisTypes';
import type { Parser, Tree } from './ast/parser';
import type { QueryCatalog } from './catalog';
import { errorMessage, silentLogger, type Logger } from './logger';
import {
	directoryPolicy,
	listSourceFiles,
	nodeFs,
	normalizeUri,
	pathToUri,
	uriToPath,
	type ScanRootPolicy,
	type WorkspaceFs,
} from './scanner';
import { SymbolStore } from './symbolIndex';

export interface AmbleDocument {
	uri: string;
	version: number | null;
	text: string;
	tree: Tree;
}

export interface WorkspaceOptions {
	parser: Parser;
	catalog: QueryCatalog;
	logger?: Logger;
	fs?: WorkspaceFs;
	scanRoots?: ScanRootPolicy;
	extension?: string;
}

/**
 * Open documents, the facts of every scanned file and the symbol index built from them.
 *
 * Re-indexing a file is one synchronous step (parse, query, swap its entries), so lookups
 * never see a file half replaced. Directory scans are asynchronous and run one at a time per
 * directory.
 */
export class Workspace {
	readonly symbols = new SymbolStore();
	readonly catalog: QueryCatalog;
	extension: string;
	private readonly parser: Parser;
	private readonly logger: Logger;
	private readonly fs: WorkspaceFs;
	private readonly scanRoots: ScanRootPolicy;
	private readonly documents = new Map<string, AmbleDocument>();
	private readonly facts = new Map<string, FileFacts>();
	// first scan of each directory, shared by every file opened while it runs
	private readonly initialScans = new Map<string, Promise<void>>();
	private readonly queues = new Map<string, Promise<void>>();

	constructor(opts: WorkspaceOptions) {
		this.parser = opts.parser;
		this.catalog = opts.catalog;
		this.logger = opts.logger ?? silentLogger;
		this.fs = opts.fs ?? nodeFs;
		this.scanRoots = opts.scanRoots ?? directoryPolicy;
		this.extension = opts.extension ?? '.amble';
	}

	/** Indexes the document, then scans its directories the first time one of their files opens. */
	async open(uri: string, text: string, version: number | null = null): Promise<void> {
		const key = normalizeUri(uri);
		this.documents.set(key, this.reindex(key, text, version));
		const file = uriToPath(key);
		if (!file) return;
		for (const dir of this.scanRoots(file)) {
			await (this.initialScans.get(dir) ?? this.startInitialScan(dir, file));
		}
	}

	/** Replaces the text of an open document and re-indexes that file only. */
	change(uri: string, text: string, version: number | null = null): void {
		const key = normalizeUri(uri);
		this.documents.set(key, this.reindex(key, text, version));
	}

	/** Rescans every directory of the saved file, the saved file first. */
	async save(uri: string): Promise<string[]> {
		const key = normalizeUri(uri);
		const file = uriToPath(key);
		if (!file) {
			const doc = this.documents.get(key);
			if (doc) this.reindex(key, doc.text, doc.version);
			return [];
		}
		const dirs = this.scanRoots(file);
		for (const dir of dirs) {
			await (this.initialScans.has(dir) ? this.scanDirectory(dir, file) : this.startInitialScan(dir, file));
		}
		return dirs;
	}

	/** Drops the buffer; the file's index entries stay until a scan finds it gone. */
	close(uri: string): void {
		this.documents.delete(normalizeUri(uri));
	}

	async rescanAll(): Promise<void> {
		for (const dir of [...this.initialScans.keys()]) await this.scanDirectory(dir);
	}

	getDocument(uri: string): AmbleDocument | undefined {
		return this.documents.get(normalizeUri(uri));
	}

	getFacts(uri: string): FileFacts | undefined {
		return this.facts.get(normalizeUri(uri));
	}

	openDocuments(): AmbleDocument[] {
		return [...this.documents.values()];
	}

	/** Open documents living directly in one of the given directories. */
	openDocumentsIn(dirs: readonly string[]): AmbleDocument[] {
		const wanted = new Set(dirs.map(d => path.resolve(d)));
		return this.openDocuments().filter(doc => {
			const file = uriToPath(doc.uri);
			return !!file && wanted.has(path.dirname(file));
		});
	}

	scannedDirectories(): string[] {
		return [...this.initialScans.keys()];
	}

	indexedFiles(): string[] {
		return [...this.facts.keys()];
	}

	/** Names of every `let set` in the indexed files. */
	roomSetNames(): Set<string> {
		const out = new Set<string>();
		for (const facts of this.facts.values()) {
			for (const name of facts.roomSets) out.add(name);
		}
		return out;
	}

	/** Player starts of every indexed file, in indexing order. */
	playerStarts(): PlayerStart[] {
		return [...this.facts.values()].flatMap(f => f.playerStarts);
	}

	parse(text: string): Tree {
		return this.parser.parse(text);
	}

	// A first scan that fails is forgotten, so the next open of the directory retries it.
	private startInitialScan(dir: string, first: string): Promise<void> {
		const scan = this.scanDirectory(dir, first);
		this.initialScans.set(dir, scan);
		scan.catch(() => {
			if (this.initialScans.get(dir) === scan) this.initialScans.delete(dir);
		});
		return scan;
	}

	private reindex(uri: string, text: string, version: number | null): AmbleDocument {
		const tree = this.parser.parse(text);
		const facts = analyzeTree(tree, uri, this.catalog, version);
		this.symbols.replaceFile(uri, facts.definitions, facts.references);
		this.facts.set(uri, facts);
		return { uri, version, text, tree };
	}

	private scanDirectory(dir: string, first?: string): Promise<void> {
		const previous = this.queues.get(dir) ?? Promise.resolve();
		const run = previous.then(() => this.runScan(dir, first));
		this.queues.set(dir, run.catch((err: unknown) => {
			this.logger.error(`Scan of ${dir} failed: ${errorMessage(err)}`);
		}));
		return run;
	}

	private async runScan(dir: string, first?: string): Promise<void> {
		let files: string[];
		try {
			files = await listSourceFiles(this.fs, dir, this.extension);
		} catch (err) {
			this.logger.warn(`Cannot list ${dir}: ${errorMessage(err)}`);
			return;
		}
		if (first && files.includes(first)) files = [first, ...files.filter(f => f !== first)];
		this.logger.debug(`Scanning ${files.length} file(s) in ${dir}`);

		const seen = new Set<string>();
		for (const file of files) {
			const uri = pathToUri(file);
			seen.add(uri);
			const open = this.documents.get(uri);
			if (open) {
				this.documents.set(uri, this.reindex(uri, open.text, open.version));
				continue;
			}
			let text: string;
			try {
				text = await this.fs.readFile(file);
			} catch (err) {
				this.logger.warn(`Skipping unreadable file ${file}: ${errorMessage(err)}`);
				continue;
			}
			// opened while the read was in flight: the buffer is newer
			const reopened = this.documents.get(uri);
			if (reopened) this.documents.set(uri, this.reindex(uri, reopened.text, reopened.version));
			else this.reindex(uri, text, null);
		}

		const resolvedDir = path.resolve(dir);
		for (const uri of [...this.facts.keys()]) {
			if (seen.has(uri) || this.documents.has(uri)) continue;
			const file = uriToPath(uri);
			if (!file || path.dirname(file) !== resolvedDir) continue;
			this.symbols.clearFile(uri);
			this.facts.delete(uri);
			this.logger.debug(`Dropped entries of removed file ${file}`);
		}
	}
}
