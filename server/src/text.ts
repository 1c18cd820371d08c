import type { Position, Range } from 'vscode-languageserver/node';
import type { Span } from './ast';

// UTF-8 width of a code point; lone surrogates encode as U+FFFD (3 bytes).
export function utf8Width(codePoint: number): number {
	if (codePoint < 0x80) return 1;
	if (codePoint < 0x800) return 2;
	if (codePoint < 0x10000) return 3;
	return 4;
}

export function utf8Length(text: string): number {
	let bytes = 0;
	for (let i = 0; i < text.length;) {
		const cp = text.codePointAt(i) ?? 0;
		bytes += utf8Width(cp);
		i += cp > 0xffff ? 2 : 1;
	}
	return bytes;
}

/**
 * Line table over a document. Offsets are UTF-8 byte offsets (the unit syntax trees use),
 * columns are UTF-16 code units (the unit the protocol uses).
 */
export class LineIndex {
	readonly text: string;
	// string index of each line start
	private readonly lineStarts: number[] = [0];
	// byte offset of each line start
	private readonly lineStartBytes: number[] = [0];
	private readonly totalBytes: number;
	private byteTable: Uint32Array | null = null;

	constructor(text: string) {
		this.text = text;
		let bytes = 0;
		for (let i = 0; i < text.length;) {
			const cp = text.codePointAt(i) ?? 0;
			const units = cp > 0xffff ? 2 : 1;
			bytes += utf8Width(cp);
			i += units;
			if (cp === 0x0a) {
				this.lineStarts.push(i);
				this.lineStartBytes.push(bytes);
			}
		}
		this.totalBytes = bytes;
	}

	get lineCount(): number {
		return this.lineStarts.length;
	}

	get byteLength(): number {
		return this.totalBytes;
	}

	/** Byte offset of a string index. Indices inside a surrogate pair map to the pair's start. */
	indexToByte(index: number): number {
		const table = this.byteTable ?? this.buildByteTable();
		if (index <= 0) return 0;
		if (index >= table.length) return this.totalBytes;
		return table[index];
	}

	positionAt(byteOffset: number): Position {
		const target = Math.max(0, Math.min(byteOffset, this.totalBytes));
		const line = this.lineOfByte(target);
		let idx = this.lineStarts[line];
		let bytes = this.lineStartBytes[line];
		while (idx < this.text.length && bytes < target) {
			const cp = this.text.codePointAt(idx) ?? 0;
			const width = utf8Width(cp);
			if (bytes + width > target) break;
			bytes += width;
			idx += cp > 0xffff ? 2 : 1;
		}
		return { line, character: idx - this.lineStarts[line] };
	}

	/** Byte offset of a protocol position, or null when the position lies past its line. */
	offsetAt(position: Position): number | null {
		if (position.line < 0 || position.character < 0) return null;
		if (position.line >= this.lineCount) return null;
		const start = this.lineStarts[position.line];
		const contentEnd = this.lineContentEnd(position.line);
		if (start + position.character > contentEnd) return null;
		let idx = start;
		let bytes = this.lineStartBytes[position.line];
		while (idx < start + position.character) {
			const cp = this.text.codePointAt(idx) ?? 0;
			bytes += utf8Width(cp);
			idx += cp > 0xffff ? 2 : 1;
		}
		return bytes;
	}

	/** Byte offset of the end of a line's content (before `\r\n` or `\n`). */
	lineEndByte(line: number): number {
		if (line < 0) return 0;
		if (line >= this.lineCount) return this.totalBytes;
		return this.indexToByte(this.lineContentEnd(line));
	}

	lineOfByte(byteOffset: number): number {
		let lo = 0;
		let hi = this.lineStartBytes.length - 1;
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1;
			if (this.lineStartBytes[mid] <= byteOffset) lo = mid;
			else hi = mid - 1;
		}
		return lo;
	}

	rangeOf(span: Span): Range {
		return { start: this.positionAt(span.start), end: this.positionAt(span.end) };
	}

	fullRange(): Range {
		return { start: { line: 0, character: 0 }, end: this.positionAt(this.totalBytes) };
	}

	/** Text of a line without its terminator. */
	lineText(line: number): string {
		if (line < 0 || line >= this.lineCount) return '';
		return this.text.slice(this.lineStarts[line], this.lineContentEnd(line));
	}

	private lineContentEnd(line: number): number {
		let end = line + 1 < this.lineCount ? this.lineStarts[line + 1] - 1 : this.text.length;
		if (end > this.lineStarts[line] && this.text[end - 1] === '\r') end--;
		return end;
	}

	private buildByteTable(): Uint32Array {
		const table = new Uint32Array(this.text.length + 1);
		let bytes = 0;
		for (let i = 0; i < this.text.length;) {
			const cp = this.text.codePointAt(i) ?? 0;
			table[i] = bytes;
			if (cp > 0xffff) {
				table[i + 1] = bytes;
				i += 2;
			} else {
				i += 1;
			}
			bytes += utf8Width(cp);
		}
		table[this.text.length] = bytes;
		this.byteTable = table;
		return table;
	}
}

export function byteOffsetToPosition(text: string, offset: number): Position {
	return new LineIndex(text).positionAt(offset);
}

export function positionToByteOffset(text: string, position: Position): number | null {
	return new LineIndex(text).offsetAt(position);
}
