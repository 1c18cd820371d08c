import type { Location, Position, Range, TextEdit } from 'vscode-languageserver/node';
import type { Definition } from './analysisTypes';
import { splitFlagName } from './kinds';
import { resolveSymbolAtPosition, type ResolvedSymbol } from './resolver';
import { utf8Length } from './text';
import type { Workspace } from './workspace';

const RENAME_RE = /^[A-Za-z0-9_\-:]+$/;

function resolve(ws: Workspace, uri: string, position: Position): ResolvedSymbol | null {
	const doc = ws.getDocument(uri);
	if (!doc) return null;
	const sym = resolveSymbolAtPosition(doc.tree, position, ws.catalog);
	return sym && sym.name ? sym : null;
}

export function gotoDefinition(ws: Workspace, uri: string, position: Position): Location | null {
	const sym = resolve(ws, uri, position);
	if (!sym) return null;
	const def = ws.symbols.lookupDefinition(sym.kind, sym.name);
	return def ? { uri: def.uri, range: def.range } : null;
}

export function findReferences(ws: Workspace, uri: string, position: Position, includeDeclaration = true): Location[] {
	const sym = resolve(ws, uri, position);
	if (!sym) return [];
	return ws.symbols.lookupReferences(sym.kind, sym.name, includeDeclaration);
}

function definitionOf(ws: Workspace, sym: ResolvedSymbol): Definition | undefined {
	return ws.symbols.lookupDefinition(sym.kind, sym.name);
}

/** Range of the identifier under the cursor, when it names a defined symbol. */
export function prepareRename(ws: Workspace, uri: string, position: Position): Range | null {
	const doc = ws.getDocument(uri);
	const sym = resolve(ws, uri, position);
	if (!doc || !sym || !definitionOf(ws, sym)) return null;
	const { span } = sym.node;
	if (sym.kind === 'flag' && splitFlagName(sym.rawName).baseLength !== null) {
		return doc.tree.lines.rangeOf({ start: span.start, end: span.start + utf8Length(sym.name) });
	}
	return doc.tree.lines.rangeOf(span);
}

/** Edits the winning definition and every indexed reference; sequence suffixes of flags stay. */
export function computeRenameEdits(
	ws: Workspace,
	uri: string,
	position: Position,
	newName: string,
): { changes: Record<string, TextEdit[]> } {
	const changes: Record<string, TextEdit[]> = {};
	const addEdit = (target: string, range: Range) => {
		const arr = (changes[target] ||= []);
		arr.push({ range, newText: newName });
	};

	if (!RENAME_RE.test(newName)) return { changes };
	const sym = resolve(ws, uri, position);
	if (!sym || sym.name === newName) return { changes };
	const def = definitionOf(ws, sym);
	if (!def) return { changes };

	addEdit(def.uri, def.range);
	for (const ref of ws.symbols.index(sym.kind).references(sym.name)) addEdit(ref.uri, ref.renameRange);
	return { changes };
}

export function isValidSymbolName(name: string): boolean {
	return RENAME_RE.test(name);
}
