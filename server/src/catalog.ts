// Query catalogue: per-kind definition/reference queries plus completion trigger phrases.
import fs from 'node:fs';
import schema from '../data/queries.schema.json';
import { ajv, bundledDataCandidates, parseValidated, readDataFile } from './core/dataFiles';
import { SYMBOL_KINDS, type SymbolKind } from './kinds';

export type QueryRole = 'definition' | 'reference';

export interface QuerySpec {
	parents: string[];
	capture: string;
	field?: string;
}

export interface CatalogFile {
	kinds: Record<SymbolKind, Record<QueryRole, QuerySpec>>;
	completion: Array<{ pattern: string; kind: SymbolKind | 'none' }>;
}

export interface CompiledQuery {
	kind: SymbolKind;
	role: QueryRole;
	capture: string;
	parents: ReadonlySet<string>;
	field: string | null;
}

export interface CompletionTrigger {
	pattern: RegExp;
	// null: a definition position, nothing to suggest
	kind: SymbolKind | null;
}

export class QueryCatalog {
	readonly triggers: readonly CompletionTrigger[];
	private readonly queries = new Map<SymbolKind, Record<QueryRole, CompiledQuery>>();

	constructor(file: CatalogFile) {
		for (const kind of SYMBOL_KINDS) {
			const pair = file.kinds[kind];
			this.queries.set(kind, {
				definition: compile(kind, 'definition', pair.definition),
				reference: compile(kind, 'reference', pair.reference),
			});
		}
		this.triggers = file.completion.map((t, i) => {
			let pattern: RegExp;
			try {
				pattern = new RegExp(t.pattern);
			} catch (err) {
				throw new Error(`Completion trigger #${i} has an invalid pattern: ${err instanceof Error ? err.message : String(err)}`);
			}
			return { pattern, kind: t.kind === 'none' ? null : t.kind };
		});
	}

	query(kind: SymbolKind, role: QueryRole): CompiledQuery {
		const pair = this.queries.get(kind);
		if (!pair) throw new Error(`No queries for symbol kind '${kind}'`);
		return pair[role];
	}

	/** All eight queries, definitions first, in kind order. */
	all(): CompiledQuery[] {
		const out: CompiledQuery[] = [];
		for (const role of ['definition', 'reference'] as const) {
			for (const kind of SYMBOL_KINDS) out.push(this.query(kind, role));
		}
		return out;
	}

	/** Kind whose reference query captures inside nodes of this type. */
	referenceKindOf(nodeType: string): SymbolKind | null {
		for (const kind of SYMBOL_KINDS) {
			if (this.query(kind, 'reference').parents.has(nodeType)) return kind;
		}
		return null;
	}
}

function compile(kind: SymbolKind, role: QueryRole, def: QuerySpec): CompiledQuery {
	return { kind, role, capture: def.capture, parents: new Set(def.parents), field: def.field ?? null };
}

const validateCatalog = ajv.compile<CatalogFile>(schema);
const CATALOG_FILE = 'queries.yaml';

export async function loadCatalog(explicitPath?: string): Promise<QueryCatalog> {
	const { raw, resolvedPath } = await readDataFile(CATALOG_FILE, explicitPath);
	return new QueryCatalog(parseValidated(raw, resolvedPath, validateCatalog, 'Query catalogue'));
}

export function parseCatalog(raw: string, label = CATALOG_FILE): QueryCatalog {
	return new QueryCatalog(parseValidated(raw, label, validateCatalog, 'Query catalogue'));
}

let bundled: QueryCatalog | null = null;

export function bundledCatalog(): QueryCatalog {
	if (bundled) return bundled;
	for (const candidate of bundledDataCandidates(CATALOG_FILE)) {
		if (!fs.existsSync(candidate)) continue;
		bundled = parseCatalog(fs.readFileSync(candidate, 'utf8'), candidate);
		return bundled;
	}
	throw new Error(`Query catalogue "${CATALOG_FILE}" could not be resolved`);
}
