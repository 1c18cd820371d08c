import { DiagnosticSeverity, DiagnosticTag, type Diagnostic } from 'vscode-languageserver/node';
import { AMBLE_DIAGCODES, type Definition, type Diag, type DiagCode, type FileFacts, type PlayerStart } from './analysisTypes';
import { KIND_LABELS, splitFlagName } from './kinds';
import type { AmbleSettings } from './settings';
import type { SymbolStore } from './symbolIndex';
import type { Workspace } from './workspace';

export const DIAGNOSTIC_SOURCE = 'amble-lsp';

function undefinedReferences(facts: FileFacts, symbols: SymbolStore, roomSets: ReadonlySet<string>, out: Diag[]): void {
	for (const ref of facts.references) {
		if (symbols.lookupDefinition(ref.kind, ref.name)) continue;
		if (ref.kind === 'room' && roomSets.has(ref.name)) continue;
		out.push({
			range: ref.range,
			message: `Undefined ${KIND_LABELS[ref.kind]}: '${ref.rawName}'`,
			severity: DiagnosticSeverity.Error,
			code: AMBLE_DIAGCODES.UNDEFINED_SYMBOL,
		});
	}
}

// Every candidate of a contested name that lives in this file, winner included.
function duplicateDefinitions(facts: FileFacts, symbols: SymbolStore, out: Diag[]): void {
	for (const def of facts.definitions) {
		const index = symbols.index(def.kind);
		if (index.duplicates(def.name).length === 0) continue;
		if (def.kind === 'flag') {
			out.push({
				range: def.range,
				message: `Flag '${def.name}' is defined in more than one place`,
				severity: DiagnosticSeverity.Hint,
				code: AMBLE_DIAGCODES.DUPLICATE_DEFINITION,
			});
			continue;
		}
		out.push({
			range: def.range,
			message: `Duplicate ${KIND_LABELS[def.kind]} definition: '${def.name}'`,
			severity: DiagnosticSeverity.Error,
			code: AMBLE_DIAGCODES.DUPLICATE_DEFINITION,
		});
	}
}

function isWinner(def: Definition, symbols: SymbolStore): boolean {
	return symbols.lookupDefinition(def.kind, def.name) === def;
}

function unusedDefinitions(facts: FileFacts, symbols: SymbolStore, out: Diag[]): void {
	for (const def of facts.definitions) {
		if (!isWinner(def, symbols)) continue;
		if (symbols.index(def.kind).references(def.name).length > 0) continue;
		out.push({
			range: def.range,
			message: `${KIND_LABELS[def.kind]} '${def.name}' is never referenced`,
			severity: DiagnosticSeverity.Hint,
			code: AMBLE_DIAGCODES.UNUSED_DEFINITION,
			tags: [DiagnosticTag.Unnecessary],
		});
	}
}

function metadataIssues(def: Definition): string[] {
	const meta = def.metadata;
	const issues: string[] = [];
	switch (meta.kind) {
		case 'room':
			if (!meta.name) issues.push(`Room '${def.name}' is missing a name`);
			if (!meta.description) issues.push(`Room '${def.name}' is missing a description`);
			break;
		case 'item':
			if (!meta.location) issues.push(`Item '${def.name}' is missing a location`);
			if (!meta.movability) issues.push(`Item '${def.name}' is missing a movability setting`);
			break;
		case 'npc':
			if (!meta.location) issues.push(`Npc '${def.name}' is missing a location`);
			if (!meta.state) issues.push(`Npc '${def.name}' is missing a starting state`);
			break;
		case 'flag':
			break;
	}
	return issues;
}

function missingMetadata(facts: FileFacts, symbols: SymbolStore, out: Diag[]): void {
	for (const def of facts.definitions) {
		if (!isWinner(def, symbols)) continue;
		for (const message of metadataIssues(def)) {
			out.push({ range: def.range, message, severity: DiagnosticSeverity.Warning, code: AMBLE_DIAGCODES.MISSING_METADATA });
		}
	}
}

function flagSequences(facts: FileFacts, symbols: SymbolStore, out: Diag[]): void {
	for (const ref of facts.references) {
		if (ref.kind !== 'flag') continue;
		const index = splitFlagName(ref.rawName).sequence;
		if (index === null) continue;
		const meta = symbols.lookupDefinition('flag', ref.name)?.metadata;
		if (!meta || meta.kind !== 'flag') continue;
		if (!meta.sequence) {
			out.push({
				range: ref.range,
				message: `Flag '${ref.name}' is defined as a single flag but referenced as '${ref.rawName}'`,
				severity: DiagnosticSeverity.Warning,
				code: AMBLE_DIAGCODES.FLAG_NOT_SEQUENCE,
			});
		} else if (meta.sequenceLimit !== null && index >= meta.sequenceLimit) {
			out.push({
				range: ref.range,
				message: `Flag '${ref.name}' sequence limit is ${meta.sequenceLimit} but reference uses index ${index}`,
				severity: DiagnosticSeverity.Warning,
				code: AMBLE_DIAGCODES.FLAG_SEQUENCE_RANGE,
			});
		}
	}
}

const FILE_START = { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };

function playerStarts(facts: FileFacts, starts: readonly PlayerStart[], out: Diag[]): void {
	if (starts.length === 0) {
		out.push({
			range: FILE_START,
			message: 'No player start room defined in this workspace',
			severity: DiagnosticSeverity.Warning,
			code: AMBLE_DIAGCODES.MISSING_PLAYER_START,
		});
		return;
	}
	if (starts.length === 1) return;
	const rooms = starts.map(s => s.room).join(', ');
	for (const start of starts) {
		if (start.uri !== facts.uri) continue;
		out.push({
			range: start.range,
			message: `Multiple player starts defined (rooms: ${rooms})`,
			severity: DiagnosticSeverity.Warning,
			code: AMBLE_DIAGCODES.MULTIPLE_PLAYER_STARTS,
		});
	}
}

// Filter diagnostics using the disabled set; returns a new array.
export function filterDiagnostics(diags: ReadonlyArray<Diag>, disabled: ReadonlySet<DiagCode>): Diag[] {
	if (!disabled.size) return [...diags];
	return diags.filter(d => !disabled.has(d.code));
}

/** Diagnostics of one file from its last scan, checked against the current index. */
export function computeDiagnostics(ws: Workspace, uri: string, settings: AmbleSettings): Diag[] {
	const facts = ws.getFacts(uri);
	if (!facts) return [];
	const { symbols } = ws;
	const out: Diag[] = [];
	if (settings.diag.syntax) out.push(...facts.syntaxErrors);
	if (settings.diag.undefinedReferences) undefinedReferences(facts, symbols, ws.roomSetNames(), out);
	if (settings.diag.duplicateDefinitions) duplicateDefinitions(facts, symbols, out);
	if (settings.diag.unusedDefinitions) unusedDefinitions(facts, symbols, out);
	if (settings.diag.metadata) missingMetadata(facts, symbols, out);
	if (settings.diag.flagSequences) flagSequences(facts, symbols, out);
	if (settings.diag.playerStart) playerStarts(facts, ws.playerStarts(), out);
	return filterDiagnostics(out, settings.disabledDiagnostics);
}

export function toLspDiagnostic(d: Diag): Diagnostic {
	return {
		range: d.range,
		message: d.message,
		severity: d.severity ?? DiagnosticSeverity.Warning,
		code: d.code,
		source: DIAGNOSTIC_SOURCE,
		...(d.tags ? { tags: d.tags } : {}),
	};
}
