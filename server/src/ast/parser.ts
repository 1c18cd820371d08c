/*
	Error-tolerant parser driven by the grammar table.

	At each position every form of the current rule is tried and the longest match wins
	(ties go to the form with fewer inserted placeholders, then to the first listed).
	A form that already consumed a token and then fails at a slot may be completed by a
	MISSING node in place of that slot. Statement lists that cannot be matched at all get an
	ERROR node spanning the skipped tokens.
*/
import { makeNode, type ParseError, type Span, type SyntaxNode } from './index';
import { bundledGrammar, type Element, type Form, type Grammar, type Slot } from './grammar';
import { lex, unquote } from './lexer';
import { isPunct, type Token } from '../core/tokens';
import { LineIndex } from '../text';

export interface Tree {
	root: SyntaxNode;
	errors: ParseError[];
	lines: LineIndex;
	text: string;
}

type Match = { nodes: SyntaxNode[]; end: number; inserted: number; errors: ParseError[] };
type FormState = { nodes: SyntaxNode[]; errors: ParseError[]; inserted: number };
type Mark = { nodes: number; errors: number; inserted: number };
type Statements = { nodes: SyntaxNode[]; errors: ParseError[]; end: number; closed: boolean };

const NUMBER_RE = /^-?\d+(\.\d+)?$/;

export class Parser {
	constructor(private readonly grammar: Grammar) {}

	parse(text: string): Tree {
		const lines = new LineIndex(text);
		return new ParseRun(this.grammar, lex(text, lines), lines).run();
	}
}

let defaultParser: Parser | null = null;

/** Parses with the bundled grammar. */
export function parse(text: string): Tree {
	defaultParser ??= new Parser(bundledGrammar());
	return defaultParser.parse(text);
}

function snapshot(st: FormState): Mark {
	return { nodes: st.nodes.length, errors: st.errors.length, inserted: st.inserted };
}

function restore(st: FormState, mark: Mark): void {
	st.nodes.length = mark.nodes;
	st.errors.length = mark.errors;
	st.inserted = mark.inserted;
}

function describeToken(tok: Token): string {
	if (tok.kind === 'eof') return 'end of file';
	if (tok.kind === 'string') return 'string';
	return tok.value.length > 30 ? `${tok.value.slice(0, 30)}...` : tok.value;
}

function describeSlot(slot: Slot): string {
	switch (slot.kind) {
		case 'reference':
		case 'definition':
			return `${slot.symbol} name`;
		case 'string': return 'string';
		case 'number': return 'number';
		case 'boolean': return `'true' or 'false'`;
		case 'identifier': return slot.node.replace(/_/g, ' ');
	}
}

class ParseRun {
	private readonly tokens: Token[] = [];
	private readonly errors: ParseError[] = [];
	private readonly topLevel: ReadonlySet<string>;

	constructor(private readonly grammar: Grammar, all: Token[], private readonly lines: LineIndex) {
		for (const tok of all) {
			if (tok.kind === 'comment') continue;
			if (tok.kind === 'invalid') {
				this.errors.push({ span: tok.span, message: `Unexpected character '${tok.value}'` });
				continue;
			}
			if (tok.kind === 'string' && tok.unterminated) {
				this.errors.push({ span: tok.span, message: 'Unterminated string' });
			}
			this.tokens.push(tok);
		}
		this.topLevel = grammar.leadingKeywords(grammar.start);
	}

	run(): Tree {
		const res = this.parseStatements(this.grammar.start, 0, false);
		const root = makeNode('source_file', { start: 0, end: this.lines.byteLength }, res.nodes);
		const errors = [...this.errors, ...res.errors].sort((a, b) => a.span.start - b.span.start);
		return { root, errors, lines: this.lines, text: this.lines.text };
	}

	private parseStatements(rule: string, pos: number, nested: boolean): Statements {
		const nodes: SyntaxNode[] = [];
		const errors: ParseError[] = [];
		const leading = this.grammar.leadingKeywords(rule);
		let closed = false;
		for (;;) {
			const tok = this.tokens[pos];
			if (tok.kind === 'eof') break;
			if (nested) {
				if (isPunct(tok, '}')) { pos++; closed = true; break; }
				// an unclosed block ends where the next top-level construct starts
				if (tok.atLineStart && tok.kind === 'word' && this.topLevel.has(tok.value) && !leading.has(tok.value)) break;
			}
			const m = this.matchRule(rule, pos, false);
			if (m) {
				nodes.push(...m.nodes);
				errors.push(...m.errors);
				pos = m.end;
				continue;
			}
			const start = pos;
			pos = this.skipStatement(pos, leading, nested);
			const span: Span = { start: this.tokens[start].span.start, end: this.tokens[pos - 1].span.end };
			const err = makeNode('ERROR', span);
			err.isError = true;
			nodes.push(err);
			errors.push({ span, message: `Unexpected '${describeToken(this.tokens[start])}'` });
		}
		return { nodes, errors, end: pos, closed };
	}

	private skipStatement(pos: number, leading: ReadonlySet<string>, nested: boolean): number {
		let p = pos;
		for (;;) {
			p = isPunct(this.tokens[p], '{') ? this.skipBalanced(p) : p + 1;
			const tok = this.tokens[p];
			if (tok.kind === 'eof') return p;
			if (nested && isPunct(tok, '}')) return p;
			if (tok.kind === 'word' && leading.has(tok.value)) return p;
			if (tok.atLineStart && tok.kind === 'word' && this.topLevel.has(tok.value)) return p;
		}
	}

	// index just past the brace matching the one at `pos`, or the eof index
	private skipBalanced(pos: number): number {
		let depth = 0;
		let p = pos;
		for (; this.tokens[p].kind !== 'eof'; p++) {
			const tok = this.tokens[p];
			if (isPunct(tok, '{')) depth++;
			else if (isPunct(tok, '}') && --depth === 0) return p + 1;
		}
		return p;
	}

	private matchRule(rule: string, pos: number, guarded: boolean): Match | null {
		let best: Match | null = null;
		for (const form of this.grammar.forms(rule)) {
			const m = this.matchForm(form, pos, guarded);
			if (!m) continue;
			if (!best || m.end > best.end || (m.end === best.end && m.inserted < best.inserted)) best = m;
		}
		return best;
	}

	private matchForm(form: Form, pos: number, guarded: boolean): Match | null {
		const st: FormState = { nodes: [], errors: [], inserted: 0 };
		const end = this.matchSequence(form.pattern, pos, st, pos, guarded);
		if (end === null || end === pos) return null;
		if (form.transparent) return { nodes: st.nodes, end, inserted: st.inserted, errors: st.errors };
		const node = makeNode(form.node, this.spanOf(pos, end, st.nodes), st.nodes);
		return { nodes: [node], end, inserted: st.inserted, errors: st.errors };
	}

	private spanOf(from: number, to: number, children: SyntaxNode[]): Span {
		let end = this.tokens[to - 1].span.end;
		for (const child of children) end = Math.max(end, child.span.end);
		return { start: this.tokens[from].span.start, end };
	}

	private matchSequence(elements: Element[], pos: number, st: FormState, groupStart: number, guarded: boolean): number | null {
		let p = pos;
		for (const el of elements) {
			const next = this.matchElement(el, p, st, groupStart, guarded);
			if (next === null) return null;
			p = next;
		}
		return p;
	}

	private matchElement(el: Element, pos: number, st: FormState, groupStart: number, guarded: boolean): number | null {
		const tok = this.tokens[pos];
		switch (el.type) {
			case 'keyword':
				if (tok.kind !== 'word' || !el.values.includes(tok.value)) return null;
				if (el.field) st.nodes.push(this.leaf('keyword', tok, tok.value, el.field));
				return pos + 1;
			case 'punct':
				return isPunct(tok, el.value) ? pos + 1 : null;
			case 'optional': {
				const mark = snapshot(st);
				const end = this.matchSequence(el.elements, pos, st, pos, true);
				if (end === null) {
					restore(st, mark);
					return pos;
				}
				return end;
			}
			case 'block':
				return this.matchBlock(el.rule, pos, st);
			case 'slot':
				return this.matchSlotRepeat(el, pos, st, groupStart, guarded);
			case 'rule':
				return this.matchRuleRepeat(el, pos, st, guarded);
		}
	}

	private matchBlock(rule: string, pos: number, st: FormState): number | null {
		const open = this.tokens[pos];
		if (!isPunct(open, '{')) return null;
		const res = this.parseStatements(rule, pos + 1, true);
		let end = this.tokens[res.end - 1].span.end;
		for (const child of res.nodes) end = Math.max(end, child.span.end);
		st.nodes.push(makeNode('block', { start: open.span.start, end }, res.nodes));
		st.errors.push(...res.errors);
		if (!res.closed) st.errors.push({ span: open.span, message: `Expected '}' to close this block` });
		return res.end;
	}

	private matchSlotRepeat(
		el: Extract<Element, { type: 'slot' }>,
		pos: number,
		st: FormState,
		groupStart: number,
		guarded: boolean,
	): number | null {
		let p = this.matchSlot(el, pos, st, groupStart, guarded);
		if (p === null || el.repeat === 'once') return p;
		for (;;) {
			const mark = snapshot(st);
			let after: number | null;
			if (el.repeat === 'comma') {
				if (!isPunct(this.tokens[p], ',')) return p;
				after = this.matchSlot(el, p + 1, st, groupStart, true);
			} else {
				after = this.matchSlot(el, p, st, p, true);
			}
			if (after === null || after === p) {
				restore(st, mark);
				return p;
			}
			p = after;
		}
	}

	private matchSlot(
		el: Extract<Element, { type: 'slot' }>,
		pos: number,
		st: FormState,
		groupStart: number,
		guarded: boolean,
	): number | null {
		const tok = this.tokens[pos];
		const node = this.slotNode(el.slot, pos, guarded);
		if (node) {
			node.field = el.field;
			st.nodes.push(node);
			return pos + 1;
		}
		if (pos > groupStart && st.inserted === 0 && this.canInsertBefore(pos)) {
			const missing = this.missingNode(el.slot, pos);
			missing.field = el.field;
			st.nodes.push(missing);
			st.inserted++;
			st.errors.push({
				span: { start: missing.span.start, end: missing.span.start },
				message: `Expected ${describeSlot(el.slot)} before ${describeToken(tok)}`,
			});
			return pos;
		}
		return null;
	}

	// Placeholders go where nothing was typed yet: before punctuation, a string, end of
	// file, or a word that already starts another line.
	private canInsertBefore(pos: number): boolean {
		return this.tokens[pos].kind !== 'word' || this.startsLine(pos);
	}

	// A keyword is taken as a name only where it cannot start the next clause: inside a list
	// (followed by `,` or `)`), or in a required slot on the same line as what precedes it.
	private wordAllowed(pos: number, guarded: boolean): boolean {
		const tok = this.tokens[pos];
		if (tok.kind !== 'word') return false;
		if (!this.grammar.keywords.has(tok.value)) return true;
		const next = this.tokens[pos + 1];
		if (isPunct(next, ',') || isPunct(next, ')')) return true;
		return !guarded && !this.startsLine(pos);
	}

	private startsLine(pos: number): boolean {
		if (pos === 0) return true;
		const prev = this.tokens[pos - 1];
		return this.lines.lineOfByte(this.tokens[pos].span.start) > this.lines.lineOfByte(prev.span.end);
	}

	private slotNode(slot: Slot, pos: number, guarded: boolean): SyntaxNode | null {
		const tok = this.tokens[pos];
		switch (slot.kind) {
			case 'reference': {
				if (!this.wordAllowed(pos, guarded)) return null;
				const id = this.leaf(slot.identifier, tok, tok.value, null);
				return makeNode(slot.node, tok.span, [id]);
			}
			case 'definition':
				return this.wordAllowed(pos, guarded) ? this.leaf(slot.identifier, tok, tok.value, null) : null;
			case 'identifier':
				return this.wordAllowed(pos, guarded) ? this.leaf(slot.node, tok, tok.value, null) : null;
			case 'string':
				return tok.kind === 'string' ? this.leaf(slot.node, tok, unquote(tok.value), null) : null;
			case 'number':
				return tok.kind === 'word' && NUMBER_RE.test(tok.value) ? this.leaf('number', tok, tok.value, null) : null;
			case 'boolean':
				return tok.kind === 'word' && (tok.value === 'true' || tok.value === 'false')
					? this.leaf('boolean', tok, tok.value, null)
					: null;
		}
	}

	// Spans the gap after the previous token, up to the next token or the end of that line.
	private missingNode(slot: Slot, pos: number): SyntaxNode {
		const start = this.tokens[pos - 1].span.end;
		const lineEnd = this.lines.lineEndByte(this.lines.lineOfByte(start));
		const end = Math.max(start, Math.min(this.tokens[pos].span.start, lineEnd));
		const span: Span = { start, end };
		const leafType = slot.kind === 'reference' || slot.kind === 'definition'
			? slot.identifier
			: slot.kind === 'string' || slot.kind === 'identifier'
				? slot.node
				: slot.kind;
		const leaf = makeNode(leafType, span, [], '');
		leaf.isMissing = true;
		if (slot.kind !== 'reference') return leaf;
		const ref = makeNode(slot.node, span, [leaf]);
		ref.isMissing = true;
		return ref;
	}

	private matchRuleRepeat(el: Extract<Element, { type: 'rule' }>, pos: number, st: FormState, guarded: boolean): number | null {
		let p = pos;
		for (let count = 0; ; count++) {
			let at = p;
			if (count > 0 && el.repeat === 'comma') {
				if (!isPunct(this.tokens[p], ',')) break;
				at = p + 1;
			}
			const m = this.matchRule(el.rule, at, guarded || count > 0);
			if (!m || m.end === at) {
				if (count === 0 && el.repeat !== 'any') return null;
				break;
			}
			for (const node of m.nodes) {
				if (el.field) node.field = el.field;
				st.nodes.push(node);
			}
			st.errors.push(...m.errors);
			st.inserted += m.inserted;
			p = m.end;
			if (el.repeat === 'once') break;
		}
		return p;
	}

	private leaf(type: string, tok: Token, text: string, field: string | null): SyntaxNode {
		const node = makeNode(type, tok.span, [], text);
		node.field = field;
		return node;
	}
}
