import type { Span, SyntaxNode } from './ast';
import type { CompiledQuery } from './catalog';

export interface Capture {
	// identifier text as written
	name: string;
	span: Span;
	// the captured identifier leaf
	node: SyntaxNode;
	// parent the query matched on (definition construct or reference node)
	enclosing: SyntaxNode;
}

export function matchesQuery(query: CompiledQuery, node: SyntaxNode): boolean {
	if (node.type !== query.capture || !node.parent) return false;
	if (!query.parents.has(node.parent.type)) return false;
	return query.field === null || node.field === query.field;
}

/** Captures of a query in document order. MISSING and empty identifiers are never captured. */
export function runQuery(query: CompiledQuery, root: SyntaxNode): Capture[] {
	const out: Capture[] = [];
	const stack: SyntaxNode[] = [root];
	while (stack.length) {
		const node = stack.pop();
		if (!node || node.isError) continue;
		if (matchesQuery(query, node) && node.parent && !node.isMissing && node.text) {
			out.push({ name: node.text, span: node.span, node, enclosing: node.parent });
		}
		for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
	}
	return out;
}
