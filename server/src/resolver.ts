import type { Position } from 'vscode-languageserver/node';
import { descendantAt, type SyntaxNode } from './ast';
import type { Tree } from './ast/parser';
import type { QueryCatalog, QueryRole } from './catalog';
import { SYMBOL_KINDS, splitFlagName, type SymbolKind } from './kinds';
import { matchesQuery } from './queries';

export interface ResolvedSymbol {
	kind: SymbolKind;
	// normalized name; empty while the identifier is still MISSING
	name: string;
	rawName: string;
	role: QueryRole;
	// identifier leaf, or the reference node when it has none yet
	node: SyntaxNode;
}

function normalize(kind: SymbolKind, raw: string): string {
	return kind === 'flag' ? splitFlagName(raw).base : raw;
}

function resolved(kind: SymbolKind, role: QueryRole, node: SyntaxNode): ResolvedSymbol {
	const rawName = node.isMissing ? '' : node.text ?? '';
	return { kind, name: normalize(kind, rawName), rawName, role, node };
}

/**
 * Symbol at a byte offset: walks up from the innermost node until a reference node of one of
 * the four kinds, or the identifier of a definition, is found.
 */
export function resolveSymbolAt(root: SyntaxNode, offset: number, catalog: QueryCatalog): ResolvedSymbol | null {
	for (let node = descendantAt(root, offset); node; node = node.parent) {
		if (node.isError) return null;
		const refKind = catalog.referenceKindOf(node.type);
		if (refKind) {
			const capture = catalog.query(refKind, 'reference').capture;
			const id = node.children.find(c => c.type === capture);
			return resolved(refKind, 'reference', id ?? node);
		}
		for (const kind of SYMBOL_KINDS) {
			if (matchesQuery(catalog.query(kind, 'definition'), node)) return resolved(kind, 'definition', node);
		}
	}
	return null;
}

export function resolveSymbolAtPosition(tree: Tree, position: Position, catalog: QueryCatalog): ResolvedSymbol | null {
	const offset = tree.lines.offsetAt(position);
	if (offset === null) return null;
	return resolveSymbolAt(tree.root, offset, catalog);
}
