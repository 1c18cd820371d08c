import { describe, it, expect } from 'vitest';
import type { Definition } from '../src/analysisTypes';
import { ambleHover, escapeMarkdown, formatDefinition } from '../src/hover';
import { MemoryFs, makeWorkspace, openAll, positionOf, worldUri } from './testUtils';

const A = 'room hall {\n    name "Hall"\n    desc "A long hall."\n}\n';
const B = 'room kitchen {\n    name "Kitchen"\n    desc "Pots everywhere."\n    exit west -> hall\n}\n';

const range = (line: number, start: number, end: number) => ({
	start: { line, character: start },
	end: { line, character: end },
});

function itemDef(metadata: Partial<Extract<Definition['metadata'], { kind: 'item' }>>): Definition {
	return {
		kind: 'item',
		name: 'lamp',
		uri: 'file:///world/items.amble',
		range: range(0, 5, 9),
		span: { start: 5, end: 9 },
		fullRange: range(0, 0, 9),
		metadata: {
			kind: 'item',
			name: null,
			description: null,
			location: null,
			movability: null,
			containerState: null,
			abilities: [],
			requirements: [],
			...metadata,
		},
	};
}

describe('hover', () => {
	it('summarizes the room behind a reference', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B });
		const ws = makeWorkspace(fsys);
		await openAll(ws, fsys, ['b.amble']);
		expect(ambleHover(ws, worldUri('b.amble'), positionOf(B, '-> hall', 5))).toEqual({
			contents: {
				kind: 'markdown',
				value: [
					'**Room:** Hall (hall)',
					'- **File:** a.amble',
					'- **Description:** A long hall.',
					'- **Exits:** (none)',
				].join('\n'),
			},
			range: range(3, 17, 21),
		});
	});

	it('lists exits of a room', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B });
		const ws = makeWorkspace(fsys);
		await openAll(ws, fsys, ['b.amble']);
		const hover = ambleHover(ws, worldUri('b.amble'), { line: 0, character: 6 });
		expect(hover?.contents).toEqual({
			kind: 'markdown',
			value: [
				'**Room:** Kitchen (kitchen)',
				'- **File:** b.amble',
				'- **Description:** Pots everywhere.',
				'- **Exits:** west → hall',
			].join('\n'),
		});
	});

	it('marks undefined symbols', async () => {
		const src = 'trigger "Talk" when talk to npc merchant {\n    do show "Hello"\n}\n';
		const fsys = new MemoryFs({ 't.amble': src });
		const ws = makeWorkspace(fsys);
		await openAll(ws, fsys, ['t.amble']);
		expect(ambleHover(ws, worldUri('t.amble'), { line: 0, character: 35 })).toEqual({
			contents: { kind: 'markdown', value: '**Npc:** merchant\n\n_Not defined_' },
			range: range(0, 32, 40),
		});
		expect(ambleHover(ws, worldUri('t.amble'), { line: 1, character: 6 })).toBeNull();
	});

	it('names the trigger that defines a flag', async () => {
		const src = 'trigger "Start" when always {\n    do add seq flag quest limit 3\n}\n';
		const fsys = new MemoryFs({ 't.amble': src });
		const ws = makeWorkspace(fsys);
		await openAll(ws, fsys, ['t.amble']);
		expect(ambleHover(ws, worldUri('t.amble'), positionOf(src, 'quest', 1))?.contents).toEqual({
			kind: 'markdown',
			value: [
				'**Flag:** quest',
				'- **File:** t.amble',
				'- **Defined in trigger:** Start',
				'- **Sequence limit:** 3',
			].join('\n'),
		});
	});
});

describe('definition summaries', () => {
	it('fills in placeholders for missing item details', () => {
		expect(formatDefinition(itemDef({}))).toBe([
			'**Item:** lamp',
			'- **File:** items.amble',
			'- **Description:** (missing)',
			'- **Movability:** (none)',
			'- **Location:** (missing)',
			'- **Container state:** (none)',
			'- **Abilities:** (none)',
			'- **Requires:** (none)',
		].join('\n'));
	});

	it('truncates long descriptions and escapes table syntax', () => {
		const text = formatDefinition(itemDef({
			name: 'Lamp | Light',
			description: 'x'.repeat(120),
			abilities: ['turnOn', 'read'],
			requirements: ['fire -> ignite'],
		}));
		const lines = text.split('\n');
		expect(lines[0]).toBe('**Item:** Lamp \\| Light (lamp)');
		expect(lines[2]).toBe(`- **Description:** ${'x'.repeat(100)}...`);
		expect(lines[6]).toBe('- **Abilities:** turnOn, read');
		expect(lines[7]).toBe('- **Requires:** fire -> ignite');
	});

	it('escapes pipes and line breaks', () => {
		expect(escapeMarkdown('a|b\r\nc')).toBe('a\\|b<br>c');
	});
});
