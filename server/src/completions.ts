import { CompletionItemKind, type CompletionItem, type Position } from 'vscode-languageserver/node';
import { lex } from './ast/lexer';
import type { QueryCatalog } from './catalog';
import { KIND_LABELS, type SymbolKind } from './kinds';
import { resolveSymbolAt } from './resolver';
import type { AmbleDocument, Workspace } from './workspace';

// Outcome of one detection strategy: a kind, a definition position (nothing to offer) or no opinion.
type Detection = { kind: SymbolKind | null } | undefined;

type Strategy = (doc: AmbleDocument, position: Position, catalog: QueryCatalog) => Detection;

const PARTIAL_IDENT_RE = /[A-Za-z0-9_\-:#]*$/;

// Prose in strings and comments never names a symbol.
function literal(doc: AmbleDocument, position: Position): Detection {
	const offset = doc.tree.lines.offsetAt(position);
	if (offset === null) return undefined;
	for (const tok of lex(doc.text, doc.tree.lines)) {
		if (tok.span.start >= offset) break;
		if (tok.kind !== 'string' && tok.kind !== 'comment') continue;
		const open = tok.kind === 'comment' || tok.unterminated === true;
		if (offset < tok.span.end || (open && offset === tok.span.end)) return { kind: null };
	}
	return undefined;
}

function structural(doc: AmbleDocument, position: Position, catalog: QueryCatalog): Detection {
	const offset = doc.tree.lines.offsetAt(position);
	if (offset === null) return undefined;
	for (const at of [offset, offset - 1]) {
		if (at < 0) continue;
		const sym = resolveSymbolAt(doc.tree.root, at, catalog);
		if (!sym) continue;
		return { kind: sym.role === 'definition' ? null : sym.kind };
	}
	return undefined;
}

function lexical(doc: AmbleDocument, position: Position, catalog: QueryCatalog): Detection {
	const before = doc.tree.lines.lineText(position.line).slice(0, position.character);
	const prefix = before.replace(PARTIAL_IDENT_RE, '').trimEnd();
	if (!prefix) return undefined;
	const hit = catalog.triggers.find(t => t.pattern.test(prefix));
	return hit ? { kind: hit.kind } : undefined;
}

const STRATEGIES: readonly Strategy[] = [literal, structural, lexical];

/** Symbol kind expected at the cursor, or null when nothing should be suggested. */
export function completionKindAt(doc: AmbleDocument, position: Position, catalog: QueryCatalog): SymbolKind | null {
	for (const strategy of STRATEGIES) {
		const found = strategy(doc, position, catalog);
		if (found) return found.kind;
	}
	return null;
}

export function symbolCompletions(ws: Workspace, kind: SymbolKind): CompletionItem[] {
	return ws.symbols.index(kind).definitions().map(def => ({
		label: def.name,
		kind: CompletionItemKind.Constant,
		detail: `${KIND_LABELS[kind]}: ${def.name}`,
		documentation: `Defined in: ${def.uri}`,
	}));
}

export function ambleCompletions(ws: Workspace, uri: string, position: Position): CompletionItem[] {
	const doc = ws.getDocument(uri);
	if (!doc) return [];
	const kind = completionKindAt(doc, position, ws.catalog);
	return kind ? symbolCompletions(ws, kind) : [];
}
