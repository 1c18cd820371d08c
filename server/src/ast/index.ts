// Syntax tree for Amble sources. Spans are UTF-8 byte offsets into the document.

export type Span = { start: number; end: number };

export interface SyntaxNode {
	type: string;
	span: Span;
	// field name this node fills in its parent, if any
	field: string | null;
	// identifier / literal text for leaves (strings unquoted), null for inner nodes
	text: string | null;
	isMissing: boolean;
	isError: boolean;
	// true when the node ends in a MISSING placeholder, making its end offset inclusive
	openEnd: boolean;
	parent: SyntaxNode | null;
	children: SyntaxNode[];
}

export interface ParseError {
	span: Span;
	message: string;
}

export function makeNode(type: string, span: Span, children: SyntaxNode[] = [], text: string | null = null): SyntaxNode {
	const node: SyntaxNode = {
		type,
		span,
		field: null,
		text,
		isMissing: false,
		isError: false,
		openEnd: false,
		parent: null,
		children,
	};
	for (const child of children) child.parent = node;
	const last = children[children.length - 1];
	if (last && last.span.end === span.end && (last.isMissing || last.openEnd)) node.openEnd = true;
	return node;
}

export function containsOffset(node: SyntaxNode, offset: number): boolean {
	if (offset < node.span.start) return false;
	if (offset < node.span.end) return true;
	return offset === node.span.end && (node.isMissing || node.openEnd);
}

/** Innermost node whose span contains the offset. */
export function descendantAt(root: SyntaxNode, offset: number): SyntaxNode | null {
	if (!containsOffset(root, offset)) return null;
	let node = root;
	for (;;) {
		const next = node.children.find(c => containsOffset(c, offset));
		if (!next) return node;
		node = next;
	}
}

export function childForField(node: SyntaxNode, field: string): SyntaxNode | null {
	return node.children.find(c => c.field === field) ?? null;
}

export function childOfType(node: SyntaxNode, type: string): SyntaxNode | null {
	return node.children.find(c => c.type === type) ?? null;
}

export function findAncestor(node: SyntaxNode, predicate: (n: SyntaxNode) => boolean): SyntaxNode | null {
	for (let cur = node.parent; cur; cur = cur.parent) {
		if (predicate(cur)) return cur;
	}
	return null;
}

/** Statements of the `{ … }` block directly under a node. */
export function blockStatements(node: SyntaxNode): SyntaxNode[] {
	const block = childOfType(node, 'block');
	return block ? block.children.filter(c => !c.isError) : [];
}
