import { describe, it, expect } from 'vitest';
import { computeRenameEdits, findReferences, gotoDefinition, isValidSymbolName, prepareRename } from '../src/navigation';
import { MemoryFs, makeWorkspace, openAll, positionOf, worldUri } from './testUtils';

const A = 'room hall {\n    name "Hall"\n    desc "A long hall."\n}\n';
const B = 'room kitchen {\n    name "Kitchen"\n    desc "Pots everywhere."\n    exit west -> hall\n}\n';
const C = [
	'trigger "One" when always {',
	'    do add flag q1',
	'}',
	'trigger "Two" when always {',
	'    do add flag q1',
	'}',
	'trigger "Three" when always {',
	'    if has flag q1 { do show "done" }',
	'}',
	'',
].join('\n');
const QUEST = [
	'trigger "Begin" when always {',
	'    do add seq flag quest limit 3',
	'}',
	'trigger "Check" when always {',
	'    if has flag quest#1 {',
	'        do advance flag quest',
	'    }',
	'}',
	'',
].join('\n');

const range = (line: number, start: number, end: number) => ({
	start: { line, character: start },
	end: { line, character: end },
});

async function world(files: Record<string, string>) {
	const fsys = new MemoryFs(files);
	const ws = makeWorkspace(fsys);
	await openAll(ws, fsys, Object.keys(files));
	return ws;
}

describe('go to definition', () => {
	it('jumps from a reference to the definition in another file', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		const loc = gotoDefinition(ws, worldUri('b.amble'), positionOf(B, '-> hall', 4));
		expect(loc).toEqual({ uri: worldUri('a.amble'), range: range(0, 5, 9) });
	});

	it('resolves from the last character of the identifier', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		expect(gotoDefinition(ws, worldUri('b.amble'), { line: 3, character: 20 })?.uri).toBe(worldUri('a.amble'));
		expect(gotoDefinition(ws, worldUri('b.amble'), { line: 3, character: 21 })).toBeNull();
	});

	it('returns a definition for a definition', async () => {
		const ws = await world({ 'a.amble': A });
		expect(gotoDefinition(ws, worldUri('a.amble'), { line: 0, character: 6 })).toEqual({
			uri: worldUri('a.amble'),
			range: range(0, 5, 9),
		});
	});

	it('finds the first flag definition in scan order', async () => {
		const ws = await world({ 'c.amble': C });
		const loc = gotoDefinition(ws, worldUri('c.amble'), positionOf(C, 'flag q1 {', 5));
		expect(loc).toEqual({ uri: worldUri('c.amble'), range: range(1, 16, 18) });
	});

	it('returns null off a symbol, past the line end and for unknown documents', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		expect(gotoDefinition(ws, worldUri('b.amble'), { line: 1, character: 6 })).toBeNull();
		expect(gotoDefinition(ws, worldUri('b.amble'), { line: 3, character: 40 })).toBeNull();
		expect(gotoDefinition(ws, worldUri('missing.amble'), { line: 0, character: 0 })).toBeNull();
	});

	it('returns null for an undefined name', async () => {
		const ws = await world({ 'b.amble': B });
		expect(gotoDefinition(ws, worldUri('b.amble'), positionOf(B, '-> hall', 4))).toBeNull();
	});
});

describe('find references', () => {
	it('lists the definition and every reference', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		expect(findReferences(ws, worldUri('a.amble'), { line: 0, character: 5 })).toEqual([
			{ uri: worldUri('a.amble'), range: range(0, 5, 9) },
			{ uri: worldUri('b.amble'), range: range(3, 17, 21) },
		]);
		expect(findReferences(ws, worldUri('a.amble'), { line: 0, character: 5 }, false)).toEqual([
			{ uri: worldUri('b.amble'), range: range(3, 17, 21) },
		]);
	});

	it('counts shadowed definitions as neither', async () => {
		const ws = await world({ 'c.amble': C });
		expect(findReferences(ws, worldUri('c.amble'), positionOf(C, 'q1', 0, 1))).toEqual([
			{ uri: worldUri('c.amble'), range: range(1, 16, 18) },
			{ uri: worldUri('c.amble'), range: range(7, 16, 18) },
		]);
	});

	it('groups sequence references under the base flag', async () => {
		const ws = await world({ 'q.amble': QUEST });
		expect(findReferences(ws, worldUri('q.amble'), positionOf(QUEST, 'quest#1', 1), false)).toEqual([
			{ uri: worldUri('q.amble'), range: range(4, 16, 23) },
			{ uri: worldUri('q.amble'), range: range(5, 24, 29) },
		]);
	});
});

describe('rename', () => {
	it('prepares on defined symbols only', async () => {
		const ws = await world({ 'b.amble': B });
		expect(prepareRename(ws, worldUri('b.amble'), { line: 0, character: 7 })).toEqual(range(0, 5, 12));
		expect(prepareRename(ws, worldUri('b.amble'), positionOf(B, '-> hall', 4))).toBeNull();
	});

	it('prepares only the base of a sequence flag', async () => {
		const ws = await world({ 'q.amble': QUEST });
		expect(prepareRename(ws, worldUri('q.amble'), positionOf(QUEST, 'quest#1', 2))).toEqual(range(4, 16, 21));
	});

	it('edits the definition and every reference across files', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		expect(computeRenameEdits(ws, worldUri('b.amble'), positionOf(B, '-> hall', 4), 'great_hall')).toEqual({
			changes: {
				[worldUri('a.amble')]: [{ range: range(0, 5, 9), newText: 'great_hall' }],
				[worldUri('b.amble')]: [{ range: range(3, 17, 21), newText: 'great_hall' }],
			},
		});
	});

	it('keeps sequence suffixes when renaming a flag', async () => {
		const ws = await world({ 'q.amble': QUEST });
		const edits = computeRenameEdits(ws, worldUri('q.amble'), { line: 1, character: 22 }, 'mission');
		expect(edits.changes[worldUri('q.amble')]).toEqual([
			{ range: range(1, 20, 25), newText: 'mission' },
			{ range: range(4, 16, 21), newText: 'mission' },
			{ range: range(5, 24, 29), newText: 'mission' },
		]);
	});

	it('refuses invalid, unchanged and undefined names', async () => {
		const ws = await world({ 'a.amble': A, 'b.amble': B });
		const at = positionOf(B, '-> hall', 4);
		expect(computeRenameEdits(ws, worldUri('b.amble'), at, 'two words')).toEqual({ changes: {} });
		expect(computeRenameEdits(ws, worldUri('b.amble'), at, 'hall')).toEqual({ changes: {} });
		expect(computeRenameEdits(ws, worldUri('b.amble'), { line: 1, character: 5 }, 'x')).toEqual({ changes: {} });
	});

	it('accepts identifier characters only', () => {
		expect(isValidSymbolName('cellar-door:2')).toBe(true);
		expect(isValidSymbolName('quest#1')).toBe(false);
		expect(isValidSymbolName('')).toBe(false);
	});
});
