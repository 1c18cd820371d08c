import { describe, it, expect } from 'vitest';
import { DiagnosticSeverity, DiagnosticTag } from 'vscode-languageserver/node';
import { computeDiagnostics, filterDiagnostics, toLspDiagnostic } from '../src/diagnostics';
import type { DiagCode } from '../src/analysisTypes';
import { defaultSettings, type AmbleSettings, type DiagToggles } from '../src/settings';
import { MemoryFs, makeWorkspace, openAll, worldUri } from './testUtils';

const TALK = 'trigger "Talk" when talk to npc merchant {\n    do show "Hello"\n}\n';
const MERCHANT = 'npc merchant {\n    location room hall\n    state normal\n}\n';

const range = (line: number, start: number, end: number) => ({
	start: { line, character: start },
	end: { line, character: end },
});

function only(toggle: keyof DiagToggles): AmbleSettings {
	const settings = defaultSettings();
	settings.diag = {
		undefinedReferences: false,
		syntax: false,
		unusedDefinitions: false,
		duplicateDefinitions: false,
		flagSequences: false,
		metadata: false,
		playerStart: false,
		[toggle]: true,
	};
	return settings;
}

async function world(files: Record<string, string>) {
	const fsys = new MemoryFs(files);
	const ws = makeWorkspace(fsys);
	await openAll(ws, fsys, Object.keys(files));
	return { ws, fsys };
}

describe('undefined references', () => {
	it('reports a reference with no definition', async () => {
		const { ws } = await world({ 'talk.amble': TALK });
		expect(computeDiagnostics(ws, worldUri('talk.amble'), only('undefinedReferences'))).toEqual([
			{
				range: range(0, 32, 40),
				message: "Undefined Npc: 'merchant'",
				severity: DiagnosticSeverity.Error,
				code: 'AMB001',
			},
		]);
	});

	it('clears once the definition appears in a sibling file', async () => {
		const { ws, fsys } = await world({ 'talk.amble': TALK });
		fsys.write('npc.amble', MERCHANT);
		await ws.save(worldUri('talk.amble'));
		expect(computeDiagnostics(ws, worldUri('talk.amble'), only('undefinedReferences'))).toEqual([]);
	});

	it('accepts a room set in place of a room', async () => {
		const src = [
			'trigger "T" when always {',
			'    if in rooms upstairs { do show "a" }',
			'    if in rooms attic { do show "b" }',
			'}',
			'',
		].join('\n');
		const { ws } = await world({ 'sets.amble': 'let set upstairs = (hall)\n', 't.amble': src });
		expect(computeDiagnostics(ws, worldUri('t.amble'), only('undefinedReferences'))).toEqual([
			{
				range: range(2, 16, 21),
				message: "Undefined Room: 'attic'",
				severity: DiagnosticSeverity.Error,
				code: 'AMB001',
			},
		]);
	});

	it('names a sequence flag as written', async () => {
		const src = 'trigger "T" when always {\n    if has flag quest#2 { do show "x" }\n}\n';
		const { ws } = await world({ 't.amble': src });
		const diags = computeDiagnostics(ws, worldUri('t.amble'), only('undefinedReferences'));
		expect(diags.map(d => d.message)).toEqual(["Undefined Flag: 'quest#2'"]);
	});

	it('returns nothing for files never scanned', async () => {
		const { ws } = await world({});
		expect(computeDiagnostics(ws, worldUri('nope.amble'), defaultSettings())).toEqual([]);
	});
});

describe('other checks', () => {
	it('reports syntax errors', async () => {
		const { ws } = await world({ 'r.amble': 'room hall {\n  name "Hall\n}\n' });
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('syntax'))).toEqual([
			{ range: range(1, 7, 12), message: 'Unterminated string', severity: DiagnosticSeverity.Error, code: 'AMB000' },
		]);
	});

	it('marks unreferenced definitions as unnecessary', async () => {
		const { ws } = await world({ 'r.amble': 'room hall {\n}\nroom cellar {\n    exit up -> hall\n}\n' });
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('unusedDefinitions'))).toEqual([
			{
				range: range(2, 5, 11),
				message: "Room 'cellar' is never referenced",
				severity: DiagnosticSeverity.Hint,
				code: 'AMB100',
				tags: [DiagnosticTag.Unnecessary],
			},
		]);
	});

	it('reports missing metadata on winning definitions', async () => {
		const { ws } = await world({ 'n.amble': MERCHANT, 'r.amble': 'room hall {\n    name "Hall"\n}\n' });
		expect(computeDiagnostics(ws, worldUri('n.amble'), only('metadata'))).toEqual([]);
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('metadata'))).toEqual([
			{
				range: range(0, 5, 9),
				message: "Room 'hall' is missing a description",
				severity: DiagnosticSeverity.Warning,
				code: 'AMB110',
			},
		]);
	});

	it('reports duplicates only when enabled', async () => {
		const src = 'room hall {\n}\nroom hall {\n}\n';
		const { ws } = await world({ 'r.amble': src });
		expect(computeDiagnostics(ws, worldUri('r.amble'), defaultSettings()).filter(d => d.code === 'AMB010')).toEqual([]);
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('duplicateDefinitions'))).toEqual([
			{ range: range(0, 5, 9), message: "Duplicate Room definition: 'hall'", severity: DiagnosticSeverity.Error, code: 'AMB010' },
			{ range: range(2, 5, 9), message: "Duplicate Room definition: 'hall'", severity: DiagnosticSeverity.Error, code: 'AMB010' },
		]);
	});

	it('reports repeated flag definitions as hints', async () => {
		const src = 'trigger "A" when always {\n    do add flag q1\n    do add flag q1\n}\n';
		const { ws } = await world({ 't.amble': src });
		const diags = computeDiagnostics(ws, worldUri('t.amble'), only('duplicateDefinitions'));
		expect(diags.map(d => [d.range.start.line, d.severity, d.message])).toEqual([
			[1, DiagnosticSeverity.Hint, "Flag 'q1' is defined in more than one place"],
			[2, DiagnosticSeverity.Hint, "Flag 'q1' is defined in more than one place"],
		]);
	});

	it('checks sequence indexes against the flag definition', async () => {
		const src = [
			'trigger "A" when always {',
			'    do add seq flag quest limit 2',
			'    do add flag lit',
			'    if has flag quest#1 { do show "a" }',
			'    if has flag quest#2 { do show "b" }',
			'    if has flag lit#1 { do show "c" }',
			'}',
			'',
		].join('\n');
		const { ws } = await world({ 't.amble': src });
		expect(computeDiagnostics(ws, worldUri('t.amble'), only('flagSequences'))).toEqual([
			{
				range: range(4, 16, 23),
				message: "Flag 'quest' sequence limit is 2 but reference uses index 2",
				severity: DiagnosticSeverity.Warning,
				code: 'AMB020',
			},
			{
				range: range(5, 16, 21),
				message: "Flag 'lit' is defined as a single flag but referenced as 'lit#1'",
				severity: DiagnosticSeverity.Warning,
				code: 'AMB021',
			},
		]);
	});

	it('drops disabled codes', async () => {
		const { ws } = await world({ 'talk.amble': TALK });
		const settings = defaultSettings();
		settings.disabledDiagnostics.add('AMB001');
		settings.disabledDiagnostics.add('AMB030');
		expect(computeDiagnostics(ws, worldUri('talk.amble'), settings)).toEqual([]);
	});
});

describe('player start', () => {
	const game = (room: string) => `game {\n    player {\n        start room ${room}\n    }\n}\n`;

	it('warns when no file names a start room', async () => {
		const { ws } = await world({ 'r.amble': 'room hall {\n}\n' });
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('playerStart'))).toEqual([
			{
				range: range(0, 0, 0),
				message: 'No player start room defined in this workspace',
				severity: DiagnosticSeverity.Warning,
				code: 'AMB030',
			},
		]);
	});

	it('accepts a single start in a sibling file', async () => {
		const { ws } = await world({ 'game.amble': game('hall'), 'r.amble': 'room hall {\n}\n' });
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('playerStart'))).toEqual([]);
		expect(computeDiagnostics(ws, worldUri('game.amble'), only('playerStart'))).toEqual([]);
	});

	it('flags every start when there are several', async () => {
		const { ws } = await world({ 'a.amble': game('hall'), 'b.amble': game('cellar'), 'r.amble': 'room hall {\n}\n' });
		expect(computeDiagnostics(ws, worldUri('a.amble'), only('playerStart'))).toEqual([
			{
				range: range(2, 8, 23),
				message: 'Multiple player starts defined (rooms: hall, cellar)',
				severity: DiagnosticSeverity.Warning,
				code: 'AMB031',
			},
		]);
		expect(computeDiagnostics(ws, worldUri('b.amble'), only('playerStart')).map(d => [d.range.start.line, d.code])).toEqual([
			[2, 'AMB031'],
		]);
		expect(computeDiagnostics(ws, worldUri('r.amble'), only('playerStart'))).toEqual([]);
	});
});

describe('protocol conversion', () => {
	it('adds the source and a default severity', () => {
		const diag = { range: range(0, 0, 1), message: 'm', code: 'AMB110' as const };
		expect(toLspDiagnostic(diag)).toEqual({
			range: range(0, 0, 1),
			message: 'm',
			severity: DiagnosticSeverity.Warning,
			code: 'AMB110',
			source: 'amble-lsp',
		});
	});

	it('filters without touching the input', () => {
		const diags = [
			{ range: range(0, 0, 1), message: 'a', code: 'AMB001' as const },
			{ range: range(0, 0, 1), message: 'b', code: 'AMB100' as const },
		];
		expect(filterDiagnostics(diags, new Set<DiagCode>(['AMB100'])).map(d => d.message)).toEqual(['a']);
		expect(diags).toHaveLength(2);
	});
});
