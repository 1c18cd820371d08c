import type { TextEdit } from 'vscode-languageserver/node';
import type { Token } from './core/tokens';
import { isPunct } from './core/tokens';
import { lex } from './ast/lexer';
import type { FormatSettings } from './settings';
import { LineIndex } from './text';

export interface IndentInfo {
	useTabs: boolean;
	size: number;
	unit: string;
}

function gcd(a: number, b: number): number {
	return b === 0 ? a : gcd(b, a % b);
}

// Common step between indent increases; failing that, the widest of 8/4/2 dividing every indent.
function indentWidth(increases: readonly number[], indents: readonly number[]): number {
	const step = increases.reduce(gcd, 0);
	if (step >= 2 && step <= 8) return step;
	if (indents.length === 0) return 4;
	return [8, 4, 2].find(w => indents.every(n => n % w === 0)) ?? 4;
}

/** Indent unit used by a file: tabs when most indented lines use them, else the space step. */
export function detectIndent(text: string): IndentInfo {
	let tabbed = 0;
	const spaced: number[] = [];
	const increases: number[] = [];
	let previous = 0;
	for (const line of text.split(/\r?\n/)) {
		if (!line.trim()) continue;
		const lead = /^[ \t]*/.exec(line)?.[0] ?? '';
		const spaces = lead.replace(/\t/g, '').length;
		if (lead.includes('\t')) {
			if (spaces === 0) tabbed++;
		} else if (spaces > 0) {
			spaced.push(spaces);
		}
		if (spaces > previous) increases.push(spaces - previous);
		previous = spaces;
	}
	if (tabbed > spaced.length) return { useTabs: true, size: 4, unit: '\t' };
	const size = indentWidth(increases, spaced);
	return { useTabs: false, size, unit: ' '.repeat(size) };
}

function indentUnit(text: string, settings: FormatSettings): string {
	if (settings.indent === 'tab') return '\t';
	if (typeof settings.indent === 'number') return ' '.repeat(settings.indent);
	return detectIndent(text).unit;
}

type LineState = {
	// brace depth at the start of the line
	depth: number;
	// the line starts inside a multi-line string
	verbatim: boolean;
	// a multi-line string opens on this line and runs past it
	opensString: boolean;
};

function lineStates(tokens: readonly Token[], lineStarts: readonly number[]): LineState[] {
	const states: LineState[] = lineStarts.map(() => ({ depth: 0, verbatim: false, opensString: false }));
	let depth = 0;
	let t = 0;
	for (let line = 0; line < lineStarts.length; line++) {
		const start = lineStarts[line];
		while (t < tokens.length && tokens[t].kind !== 'eof' && tokens[t].index < start) {
			const tok = tokens[t++];
			if (isPunct(tok, '{')) depth++;
			else if (isPunct(tok, '}')) depth = Math.max(0, depth - 1);
		}
		states[line].depth = depth;
	}
	for (const tok of tokens) {
		if (tok.kind !== 'string' || !tok.value.includes('\n')) continue;
		const end = tok.index + tok.value.length;
		let opening = 0;
		for (let line = 0; line < lineStarts.length; line++) {
			const start = lineStarts[line];
			if (start <= tok.index) opening = line;
			else if (start < end) states[line].verbatim = true;
		}
		states[opening].opensString = true;
	}
	return states;
}

/**
 * Re-indents by brace depth, trims trailing whitespace, collapses blank runs and ends the text
 * with one newline. Bodies of multi-line strings are copied as they are.
 */
export function formatText(text: string, settings: FormatSettings): string {
	const eol = text.includes('\r\n') ? '\r\n' : '\n';
	const rawLines = text.split(/\r?\n/);
	const lineStarts: number[] = [];
	let at = 0;
	for (const line of rawLines) {
		lineStarts.push(at);
		at += line.length + (text.startsWith('\r\n', at + line.length) ? 2 : 1);
	}
	const unit = indentUnit(text, settings);
	const states = lineStates(lex(text), lineStarts);

	const out: string[] = [];
	let blank = false;
	rawLines.forEach((line, i) => {
		const state = states[i];
		if (state.verbatim) {
			out.push(line);
			blank = false;
			return;
		}
		const body = state.opensString ? line.trimStart() : line.trim();
		if (!body) {
			blank = out.length > 0;
			return;
		}
		if (blank) out.push('');
		blank = false;
		const depth = body.startsWith('}') ? Math.max(0, state.depth - 1) : state.depth;
		out.push(unit.repeat(depth) + body);
	});
	return out.length ? out.join(eol) + eol : '';
}

export function formatDocumentEdits(text: string, settings: FormatSettings): TextEdit[] {
	if (!settings.enabled) return [];
	const formatted = formatText(text, settings);
	if (formatted === text) return [];
	return [{ range: new LineIndex(text).fullRange(), newText: formatted }];
}
