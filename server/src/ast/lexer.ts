/*
	Amble lexer: words, strings, punctuation and `#` comments with UTF-8 byte spans
*/
import type { Token, TokenKind } from '../core/tokens';
import { LineIndex } from '../text';

const WORD_CHAR = /[A-Za-z0-9_\-:#]/;
const SINGLE_PUNCT = new Set(['{', '}', '(', ')', ',', '=', '%']);

export function isWordChar(ch: string | undefined): boolean {
	return !!ch && WORD_CHAR.test(ch);
}

export class Lexer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly lines: LineIndex;

	constructor(text: string, lines?: LineIndex) {
		this.text = text;
		this.n = text.length;
		this.lines = lines ?? new LineIndex(text);
	}

	/** All tokens, comments included, terminated by a single `eof` token. */
	tokenize(): Token[] {
		const out: Token[] = [];
		for (;;) {
			const t = this.scanOne();
			out.push(t);
			if (t.kind === 'eof') return out;
		}
	}

	private scanOne(): Token {
		while (this.i < this.n && /\s/.test(this.text[this.i])) this.i++;
		if (this.i >= this.n) return this.mk('eof', this.n, this.n);

		const start = this.i;
		const c = this.text[start];

		// raw string r#"..."#
		if (c === 'r' && this.text.startsWith('r#"', start)) {
			const close = this.text.indexOf('"#', start + 3);
			return this.finishString(start, close < 0 ? -1 : close + 2);
		}
		if (c === '#') {
			return this.mk('comment', start, this.findLineEnd(start));
		}
		if (this.text.startsWith('"""', start) || this.text.startsWith('\'\'\'', start)) {
			const quote = this.text.slice(start, start + 3);
			const close = this.findTripleClose(start + 3, quote);
			return this.finishString(start, close);
		}
		if (c === '"' || c === '\'') {
			let j = start + 1;
			while (j < this.n) {
				const ch = this.text[j];
				if (ch === '\\') { j += 2; continue; }
				if (ch === c || ch === '\n') break;
				j++;
			}
			return this.finishString(start, j < this.n && this.text[j] === c ? j + 1 : -1);
		}
		if (c === '-' && this.text[start + 1] === '>') {
			return this.mk('punct', start, start + 2);
		}
		if (isWordChar(c)) {
			let j = start;
			while (j < this.n && isWordChar(this.text[j])) j++;
			// decimals such as a score threshold `12.5`
			if (this.text[j] === '.' && /^-?\d+$/.test(this.text.slice(start, j)) && /\d/.test(this.text[j + 1] ?? '')) {
				j++;
				while (j < this.n && /\d/.test(this.text[j])) j++;
			}
			return this.mk('word', start, j);
		}
		if (SINGLE_PUNCT.has(c)) {
			return this.mk('punct', start, start + 1);
		}
		const cp = this.text.codePointAt(start) ?? 0;
		return this.mk('invalid', start, start + (cp > 0xffff ? 2 : 1));
	}

	// Unterminated strings end at the end of their first line.
	private finishString(start: number, end: number): Token {
		if (end < 0) {
			const tok = this.mk('string', start, this.findLineEnd(start));
			tok.unterminated = true;
			return tok;
		}
		return this.mk('string', start, end);
	}

	private findTripleClose(from: number, quote: string): number {
		let j = from;
		while (j < this.n) {
			if (this.text[j] === '\\') { j += 2; continue; }
			if (this.text.startsWith(quote, j)) return j + 3;
			j++;
		}
		return -1;
	}

	private findLineEnd(from: number): number {
		const nl = this.text.indexOf('\n', from);
		let end = nl < 0 ? this.n : nl;
		if (end > from && this.text[end - 1] === '\r') end--;
		return end;
	}

	private mk(kind: TokenKind, start: number, end: number): Token {
		this.i = end;
		return {
			kind,
			value: this.text.slice(start, end),
			span: { start: this.lines.indexToByte(start), end: this.lines.indexToByte(end) },
			index: start,
			atLineStart: start === 0 || this.text[start - 1] === '\n',
		};
	}
}

export function lex(text: string, lines?: LineIndex): Token[] {
	return new Lexer(text, lines).tokenize();
}

/** Content of a string token without quotes; escapes are resolved for the single-line forms. */
export function unquote(raw: string): string {
	if (raw.startsWith('r#"')) return raw.endsWith('"#') && raw.length >= 5 ? raw.slice(3, -2) : raw.slice(3);
	if (raw.startsWith('"""') || raw.startsWith('\'\'\'')) {
		const q = raw.slice(0, 3);
		return raw.length >= 6 && raw.endsWith(q) ? raw.slice(3, -3) : raw.slice(3);
	}
	const q = raw[0];
	const body = raw.length >= 2 && raw.endsWith(q) ? raw.slice(1, -1) : raw.slice(1);
	return body.replace(/\\(.)/g, (_m, ch: string) => {
		switch (ch) {
			case 'n': return '\n';
			case 't': return '\t';
			default: return ch;
		}
	});
}
