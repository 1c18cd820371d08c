import type { DiagnosticSeverity, DiagnosticTag, Range } from 'vscode-languageserver/node';
import type { Span } from './ast';
import type { SymbolKind } from './kinds';

export const AMBLE_DIAGCODES = {
	SYNTAX: 'AMB000',
	UNDEFINED_SYMBOL: 'AMB001',
	DUPLICATE_DEFINITION: 'AMB010',
	FLAG_SEQUENCE_RANGE: 'AMB020',
	FLAG_NOT_SEQUENCE: 'AMB021',
	MISSING_PLAYER_START: 'AMB030',
	MULTIPLE_PLAYER_STARTS: 'AMB031',
	UNUSED_DEFINITION: 'AMB100',
	MISSING_METADATA: 'AMB110',
} as const;
export type DiagCode = typeof AMBLE_DIAGCODES[keyof typeof AMBLE_DIAGCODES];

const DIAG_CODES: readonly DiagCode[] = Object.values(AMBLE_DIAGCODES);

function asDiagCode(value: string): DiagCode | null {
	return DIAG_CODES.find(c => c === value) ?? null;
}

// Friendly names come from the enum keys. Hard-error codes (< AMB010) only keep their numeric form.
const DIAG_NAME_MAP: ReadonlyMap<string, DiagCode> = (() => {
	const map = new Map<string, DiagCode>();
	for (const [enumName, code] of Object.entries(AMBLE_DIAGCODES)) {
		const m = /^AMB(\d+)/.exec(code);
		const num = m ? parseInt(m[1], 10) : 999;
		if (num < 10) continue;
		map.set(enumName.toLowerCase().replace(/_/g, '-'), code);
	}
	return map;
})();

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const code = asDiagCode(trimmed.toUpperCase());
	if (code) return code;
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP.get(canon) ?? null;
}

export interface Diag {
	range: Range;
	message: string;
	severity?: DiagnosticSeverity;
	code: DiagCode;
	tags?: DiagnosticTag[];
}

export interface RoomExit {
	direction: string;
	target: string;
}

export type SymbolMetadata =
	| { kind: 'room'; name: string | null; description: string | null; exits: RoomExit[] }
	| {
		kind: 'item';
		name: string | null;
		description: string | null;
		location: string | null;
		movability: string | null;
		containerState: string | null;
		abilities: string[];
		requirements: string[];
	}
	| { kind: 'npc'; name: string | null; description: string | null; location: string | null; state: string | null }
	| {
		kind: 'flag';
		// name of the trigger holding the defining action
		trigger: string | null;
		// defined through `add seq flag`
		sequence: boolean;
		sequenceLimit: number | null;
	};

export interface Definition {
	kind: SymbolKind;
	name: string;
	uri: string;
	// identifier range
	range: Range;
	span: Span;
	// the whole defining construct
	fullRange: Range;
	metadata: SymbolMetadata;
}

export interface Reference {
	kind: SymbolKind;
	// normalized name (flag sequence suffix removed)
	name: string;
	// identifier as written
	rawName: string;
	uri: string;
	range: Range;
	span: Span;
	// part of the identifier a rename rewrites
	renameRange: Range;
}

/** Everything the index and the handlers need from one scan of a file. */
export interface FileFacts {
	uri: string;
	version: number | null;
	definitions: Definition[];
	references: Reference[];
	// other named constructs shown as document symbols
	outline: OutlineEntry[];
	// `let set` names; a room list may name a set instead of a room
	roomSets: string[];
	playerStarts: PlayerStart[];
	syntaxErrors: Diag[];
}

export interface PlayerStart {
	room: string;
	uri: string;
	range: Range;
}

export interface OutlineEntry {
	name: string;
	detail: string;
	type: 'trigger' | 'spinner' | 'goal' | 'set' | 'game';
	range: Range;
	selectionRange: Range;
}
