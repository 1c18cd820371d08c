import {
	TextDocumentSyncKind,
	DidChangeConfigurationNotification,
	type CompletionItem,
	type Connection,
	type Diagnostic,
	type DocumentSymbol,
	type Hover,
	type InitializeParams,
	type InitializeResult,
	type Location,
	type PublishDiagnosticsParams,
	type Range,
	type TextDocuments,
	type TextEdit,
	type WorkspaceEdit,
} from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { loadGrammar } from './ast/grammar';
import { Parser } from './ast/parser';
import { loadCatalog } from './catalog';
import { ambleCompletions } from './completions';
import { computeDiagnostics, toLspDiagnostic } from './diagnostics';
import { formatDocumentEdits } from './format';
import { ambleHover } from './hover';
import { errorMessage, ServerLogger, type ConsoleSink } from './logger';
import { computeRenameEdits, findReferences, gotoDefinition, prepareRename } from './navigation';
import { defaultSettings, normalizeSettings, type AmbleSettings } from './settings';
import { normalizeUri, type WorkspaceFs } from './scanner';
import { documentSymbols } from './symbols';
import { Workspace } from './workspace';

export const CONFIG_SECTION = 'amble';
export const RESCAN_REQUEST = 'amble/rescan';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
	if (a.size !== b.size) return false;
	for (const v of a) if (!b.has(v)) return false;
	return true;
}

/** The parts of the connection the server writes to. */
export interface ServerClient {
	console: ConsoleSink;
	sendDiagnostics(params: PublishDiagnosticsParams): Promise<void>;
}

export interface AmbleServerOptions {
	// file access for directory scans, the disk by default
	fs?: WorkspaceFs;
}

/** Wires the workspace and the feature modules to a protocol connection. */
export class AmbleServer {
	private settings: AmbleSettings = defaultSettings();
	private workspace: Workspace | null = null;
	private readonly logger: ServerLogger;

	constructor(private readonly client: ServerClient, private readonly options: AmbleServerOptions = {}) {
		this.logger = new ServerLogger(client.console);
	}

	listen(connection: Connection, documents: TextDocuments<TextDocument>): void {
		connection.onInitialize(params => this.initialize(params));
		connection.onInitialized(() => {
			connection.client.register(DidChangeConfigurationNotification.type, { section: CONFIG_SECTION }).catch((e: unknown) => {
				this.logger.warn(`Configuration registration failed: ${errorMessage(e)}`);
			});
		});
		connection.onDidChangeConfiguration(change => {
			const section = isRecord(change.settings) ? change.settings[CONFIG_SECTION] : undefined;
			this.track('configuration change', this.reconfigure(section));
		});

		documents.onDidChangeContent(change => {
			const doc = change.document;
			this.track(`update of ${doc.uri}`, this.contentChanged(doc));
		});
		documents.onDidSave(e => {
			this.track(`save of ${e.document.uri}`, this.saved(e.document.uri));
		});
		documents.onDidClose(e => {
			this.closed(e.document.uri);
		});

		connection.onRequest(RESCAN_REQUEST, async () => {
			const ws = this.workspace;
			if (!ws) return { ok: false, error: 'not initialized' };
			try {
				await ws.rescanAll();
				this.publishOpen();
				return { ok: true, files: ws.indexedFiles().length };
			} catch (e) {
				this.logger.error(`Rescan failed: ${errorMessage(e)}`);
				return { ok: false, error: errorMessage(e) };
			}
		});

		connection.onDefinition((params, token): Location | null => {
			if (token?.isCancellationRequested) return null;
			return this.guard('definition', null, ws => gotoDefinition(ws, params.textDocument.uri, params.position));
		});
		connection.onReferences((params, token): Location[] => {
			if (token?.isCancellationRequested) return [];
			const includeDecl = params.context?.includeDeclaration ?? true;
			return this.guard('references', [], ws => findReferences(ws, params.textDocument.uri, params.position, includeDecl));
		});
		connection.onCompletion((params, token): CompletionItem[] => {
			if (token?.isCancellationRequested) return [];
			return this.guard('completion', [], ws => ambleCompletions(ws, params.textDocument.uri, params.position));
		});
		connection.onHover((params, token): Hover | null => {
			if (token?.isCancellationRequested) return null;
			return this.guard('hover', null, ws => ambleHover(ws, params.textDocument.uri, params.position));
		});
		connection.onDocumentSymbol((params, token): DocumentSymbol[] => {
			if (token?.isCancellationRequested) return [];
			return this.guard('documentSymbol', [], ws => {
				const facts = ws.getFacts(params.textDocument.uri);
				return facts ? documentSymbols(facts) : [];
			});
		});
		connection.onPrepareRename((params, token): Range | null => {
			if (token?.isCancellationRequested) return null;
			return this.guard('prepareRename', null, ws => prepareRename(ws, params.textDocument.uri, params.position));
		});
		connection.onRenameRequest((params, token): WorkspaceEdit => {
			if (token?.isCancellationRequested) return { changes: {} };
			return this.guard('rename', { changes: {} }, ws => computeRenameEdits(ws, params.textDocument.uri, params.position, params.newName));
		});
		connection.onDocumentFormatting((params, token): TextEdit[] => {
			if (token?.isCancellationRequested) return [];
			return this.guard('formatting', [], ws => {
				const doc = ws.getDocument(params.textDocument.uri);
				return doc ? formatDocumentEdits(doc.text, this.settings.format) : [];
			});
		});

		connection.onShutdown(() => {
			this.logger.info('Shutting down');
		});

		documents.listen(connection);
		connection.listen();
	}

	async initialize(params: InitializeParams): Promise<InitializeResult> {
		this.settings = normalizeSettings(params.initializationOptions);
		this.logger.configure({ debug: this.settings.debug, logFile: this.settings.logFile });
		try {
			const [grammar, catalog] = await Promise.all([
				loadGrammar(this.settings.grammarPath || undefined),
				loadCatalog(this.settings.queriesPath || undefined),
			]);
			this.workspace = new Workspace({
				parser: new Parser(grammar),
				catalog,
				logger: this.logger,
				fs: this.options.fs,
				extension: this.settings.extension,
			});
		} catch (e) {
			this.logger.error(`Initialization failed: ${errorMessage(e)}`);
			throw e;
		}
		this.logger.info(`Initialized (extension ${this.settings.extension})`);
		return {
			capabilities: {
				textDocumentSync: { openClose: true, change: TextDocumentSyncKind.Full, save: { includeText: false } },
				completionProvider: { triggerCharacters: [' ', '>', '(', ','] },
				hoverProvider: true,
				definitionProvider: true,
				referencesProvider: true,
				documentSymbolProvider: true,
				renameProvider: { prepareProvider: true },
				documentFormattingProvider: true,
			},
		};
	}

	async reconfigure(section: unknown): Promise<void> {
		const prev = this.settings;
		this.settings = normalizeSettings(section, prev);
		this.logger.configure({ debug: this.settings.debug, logFile: this.settings.logFile });
		const ws = this.workspace;
		if (!ws) return;
		if (this.settings.extension !== prev.extension) {
			ws.extension = this.settings.extension;
			await ws.rescanAll();
		}
		const changed = this.settings.extension !== prev.extension
			|| !setsEqual(prev.disabledDiagnostics, this.settings.disabledDiagnostics)
			|| JSON.stringify(prev.diag) !== JSON.stringify(this.settings.diag);
		if (changed) this.publishOpen();
	}

	/** Opened or edited document: re-indexes it and republishes its own diagnostics. */
	async contentChanged(doc: TextDocument): Promise<void> {
		const ws = this.workspace;
		if (!ws) return;
		if (ws.getDocument(doc.uri)) {
			ws.change(doc.uri, doc.getText(), doc.version);
		} else {
			this.logger.debug(`Opened ${doc.uri}`);
			await ws.open(doc.uri, doc.getText(), doc.version);
		}
		this.publish(doc.uri);
	}

	/** Saved document: rescans its directories and republishes every open file in them. */
	async saved(uri: string): Promise<void> {
		const ws = this.workspace;
		if (!ws) return;
		const dirs = await ws.save(uri);
		const saved = normalizeUri(uri);
		this.publish(uri);
		for (const doc of ws.openDocumentsIn(dirs)) {
			if (doc.uri !== saved) this.publish(doc.uri);
		}
	}

	closed(uri: string): void {
		this.workspace?.close(uri);
	}

	private publishOpen(): void {
		for (const doc of this.workspace?.openDocuments() ?? []) this.publish(doc.uri);
	}

	private publish(uri: string): void {
		const ws = this.workspace;
		if (!ws) return;
		let diagnostics: Diagnostic[];
		try {
			diagnostics = computeDiagnostics(ws, uri, this.settings).map(toLspDiagnostic);
		} catch (e) {
			this.logger.error(`Diagnostics for ${uri} failed: ${errorMessage(e)}`);
			return;
		}
		this.client.sendDiagnostics({ uri, diagnostics }).catch((e: unknown) => {
			this.logger.warn(`sendDiagnostics failed for ${uri}: ${errorMessage(e)}`);
		});
	}

	private guard<T>(what: string, fallback: T, run: (ws: Workspace) => T): T {
		const ws = this.workspace;
		if (!ws) return fallback;
		try {
			return run(ws);
		} catch (e) {
			this.logger.error(`${what} failed: ${errorMessage(e)}`);
			return fallback;
		}
	}

	private track(what: string, work: Promise<void>): void {
		work.catch((e: unknown) => {
			this.logger.error(`${what} failed: ${errorMessage(e)}`);
		});
	}
}
