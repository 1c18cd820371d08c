import path from 'node:path';
import { MarkupKind, type Hover, type Position } from 'vscode-languageserver/node';
import type { Definition, SymbolMetadata } from './analysisTypes';
import { KIND_LABELS, type SymbolKind } from './kinds';
import { resolveSymbolAtPosition } from './resolver';
import { uriToPath } from './scanner';
import type { Workspace } from './workspace';

const DESCRIPTION_MAX_CHARS = 100;

type Meta<K extends SymbolKind> = Extract<SymbolMetadata, { kind: K }>;

export function escapeMarkdown(text: string): string {
	return text.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}

function truncate(text: string | null): string {
	if (!text || !text.trim()) return '(missing)';
	const chars = [...escapeMarkdown(text)];
	return chars.length <= DESCRIPTION_MAX_CHARS ? chars.join('') : `${chars.slice(0, DESCRIPTION_MAX_CHARS).join('')}...`;
}

function orElse(value: string | null, fallback: string): string {
	return value ? escapeMarkdown(value) : fallback;
}

function list(values: readonly string[]): string {
	return values.length ? values.map(escapeMarkdown).join(', ') : '(none)';
}

function titleLine(kind: SymbolKind, displayName: string | null, id: string): string {
	const label = KIND_LABELS[kind];
	const safeId = escapeMarkdown(id);
	const name = displayName?.trim() ? escapeMarkdown(displayName.trim()) : null;
	if (!name || name === safeId) return `**${label}:** ${safeId}`;
	return `**${label}:** ${name} (${safeId})`;
}

function fileLine(uri: string): string {
	const file = uriToPath(uri);
	return `- **File:** ${escapeMarkdown(file ? path.basename(file) : uri)}`;
}

function roomLines(meta: Meta<'room'>): string[] {
	const exits = meta.exits.map(e => `${e.direction} → ${e.target}`);
	return [`- **Description:** ${truncate(meta.description)}`, `- **Exits:** ${list(exits)}`];
}

function itemLines(meta: Meta<'item'>): string[] {
	return [
		`- **Description:** ${truncate(meta.description)}`,
		`- **Movability:** ${orElse(meta.movability, '(none)')}`,
		`- **Location:** ${orElse(meta.location, '(missing)')}`,
		`- **Container state:** ${orElse(meta.containerState, '(none)')}`,
		`- **Abilities:** ${list(meta.abilities)}`,
		`- **Requires:** ${list(meta.requirements)}`,
	];
}

function npcLines(meta: Meta<'npc'>): string[] {
	return [
		`- **Description:** ${truncate(meta.description)}`,
		`- **Location:** ${orElse(meta.location, '(missing)')}`,
		`- **State:** ${orElse(meta.state, '(none)')}`,
	];
}

function flagLines(meta: Meta<'flag'>): string[] {
	const lines: string[] = [];
	if (meta.trigger) lines.push(`- **Defined in trigger:** ${escapeMarkdown(meta.trigger)}`);
	if (meta.sequenceLimit !== null) lines.push(`- **Sequence limit:** ${meta.sequenceLimit}`);
	if (!lines.length) lines.push('- **Defined in trigger:** (unknown)');
	return lines;
}

/** Markdown summary of a winning definition. */
export function formatDefinition(def: Definition): string {
	return definitionLines(def).join('\n');
}

function definitionLines(def: Definition): string[] {
	const meta = def.metadata;
	const file = fileLine(def.uri);
	switch (meta.kind) {
		case 'room': return [titleLine('room', meta.name, def.name), file, ...roomLines(meta)];
		case 'item': return [titleLine('item', meta.name, def.name), file, ...itemLines(meta)];
		case 'npc': return [titleLine('npc', meta.name, def.name), file, ...npcLines(meta)];
		case 'flag': return [titleLine('flag', null, def.name), file, ...flagLines(meta)];
	}
}

export function ambleHover(ws: Workspace, uri: string, position: Position): Hover | null {
	const doc = ws.getDocument(uri);
	if (!doc) return null;
	const sym = resolveSymbolAtPosition(doc.tree, position, ws.catalog);
	if (!sym || !sym.name) return null;
	const def = ws.symbols.lookupDefinition(sym.kind, sym.name);
	const value = def
		? formatDefinition(def)
		: `**${KIND_LABELS[sym.kind]}:** ${escapeMarkdown(sym.name)}\n\n_Not defined_`;
	return {
		contents: { kind: MarkupKind.Markdown, value },
		range: doc.tree.lines.rangeOf(sym.node.span),
	};
}
