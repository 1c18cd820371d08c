// Token model shared by the lexer, the parser and the formatter.

import type { Span } from '../ast';

export type TokenKind =
	| 'word' // identifiers, keywords and numbers: [A-Za-z0-9_\-:#]+
	| 'string'
	| 'punct'
	| 'comment'
	| 'invalid'
	| 'eof';

export interface Token {
	kind: TokenKind;
	// raw source text of the token
	value: string;
	// UTF-8 byte span
	span: Span;
	// string index of the first character
	index: number;
	// first character sits in column 0
	atLineStart: boolean;
	// string tokens only: closing quote missing
	unterminated?: boolean;
}

export const PUNCTUATION = ['->', '{', '}', '(', ')', ',', '=', '%'] as const;
export type Punct = typeof PUNCTUATION[number];

export function isPunct(tok: Token, value: Punct): boolean {
	return tok.kind === 'punct' && tok.value === value;
}
