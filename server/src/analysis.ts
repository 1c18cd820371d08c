/*
	Per-file analysis: runs the eight symbol queries over a parsed file and turns the
	captures into index entries, with metadata read from the defining constructs.
*/
import { DiagnosticSeverity } from 'vscode-languageserver/node';
import {
	AMBLE_DIAGCODES,
	type Definition,
	type Diag,
	type FileFacts,
	type OutlineEntry,
	type PlayerStart,
	type Reference,
	type RoomExit,
	type SymbolMetadata,
} from './analysisTypes';
import { blockStatements, childForField, findAncestor, type SyntaxNode } from './ast';
import type { Tree } from './ast/parser';
import type { QueryCatalog } from './catalog';
import { SYMBOL_KINDS, splitFlagName, type SymbolKind } from './kinds';
import { runQuery } from './queries';
import { utf8Length } from './text';

export function analyzeTree(tree: Tree, uri: string, catalog: QueryCatalog, version: number | null = null): FileFacts {
	const definitions: Definition[] = [];
	const references: Reference[] = [];
	const { lines } = tree;

	for (const kind of SYMBOL_KINDS) {
		for (const cap of runQuery(catalog.query(kind, 'definition'), tree.root)) {
			const name = kind === 'flag' ? splitFlagName(cap.name).base : cap.name;
			definitions.push({
				kind,
				name,
				uri,
				range: lines.rangeOf(cap.span),
				span: cap.span,
				fullRange: lines.rangeOf(cap.enclosing.span),
				metadata: readMetadata(kind, cap.enclosing),
			});
		}
		for (const cap of runQuery(catalog.query(kind, 'reference'), tree.root)) {
			const range = lines.rangeOf(cap.span);
			let name = cap.name;
			let renameRange = range;
			if (kind === 'flag') {
				const split = splitFlagName(cap.name);
				name = split.base;
				if (split.baseLength !== null) {
					const baseEnd = cap.span.start + utf8Length(split.base);
					renameRange = lines.rangeOf({ start: cap.span.start, end: baseEnd });
				}
			}
			references.push({ kind, name, rawName: cap.name, uri, range, span: cap.span, renameRange });
		}
	}

	const syntaxErrors: Diag[] = tree.errors.map(e => ({
		range: lines.rangeOf(e.span),
		message: e.message,
		severity: DiagnosticSeverity.Error,
		code: AMBLE_DIAGCODES.SYNTAX,
	}));

	return {
		uri,
		version,
		definitions,
		references,
		outline: readOutline(tree),
		roomSets: readRoomSets(tree),
		playerStarts: readPlayerStarts(tree, uri),
		syntaxErrors,
	};
}

function nonEmpty(value: string | null | undefined): string | null {
	return value && value.trim() ? value : null;
}

function fieldText(node: SyntaxNode, field: string): string | null {
	const child = childForField(node, field);
	if (!child) return null;
	// reference nodes carry their name on the identifier leaf
	return nonEmpty(child.text ?? child.children[0]?.text);
}

function describeLocation(place: SyntaxNode | undefined): string | null {
	if (!place) return null;
	switch (place.type) {
		case 'location_inventory': return 'inventory player';
		case 'location_room': return withValue('room', fieldText(place, 'room_id'));
		case 'location_chest': return withValue('chest', fieldText(place, 'chest_id'));
		case 'location_npc': return withValue('npc', fieldText(place, 'npc_id'));
		case 'location_nowhere': return withValue('nowhere', fieldText(place, 'note'));
		default: return null;
	}
}

function withValue(prefix: string, value: string | null): string {
	return value ? `${prefix} ${value}` : prefix;
}

function describeMovability(node: SyntaxNode | null): string | null {
	if (!node) return null;
	const note = fieldText(node, 'note');
	switch (node.type) {
		case 'movability_free': return 'free';
		case 'movability_fixed': return note ? `fixed (${note})` : 'fixed';
		case 'movability_restricted': return note ? `restricted (${note})` : 'restricted';
		default: return null;
	}
}

function describeNpcState(node: SyntaxNode | null): string | null {
	if (!node) return null;
	const state = fieldText(node, 'state');
	if (node.type === 'npc_state_custom') return state ? `custom ${state}` : null;
	return state;
}

function readMetadata(kind: SymbolKind, def: SyntaxNode): SymbolMetadata {
	switch (kind) {
		case 'room': return readRoom(def);
		case 'item': return readItem(def);
		case 'npc': return readNpc(def);
		case 'flag': return readFlag(def);
	}
}

function readRoom(def: SyntaxNode): SymbolMetadata {
	let name: string | null = null;
	let description: string | null = null;
	const exits: RoomExit[] = [];
	for (const stmt of blockStatements(def)) {
		switch (stmt.type) {
			case 'room_name': name = fieldText(stmt, 'name'); break;
			case 'room_desc': description = fieldText(stmt, 'description'); break;
			case 'room_exit': {
				const target = fieldText(stmt, 'dest');
				if (target) exits.push({ direction: fieldText(stmt, 'dir') ?? '?', target });
				break;
			}
		}
	}
	return { kind: 'room', name, description, exits };
}

function readItem(def: SyntaxNode): SymbolMetadata {
	const meta: Extract<SymbolMetadata, { kind: 'item' }> = {
		kind: 'item',
		name: null,
		description: null,
		location: null,
		movability: null,
		containerState: null,
		abilities: [],
		requirements: [],
	};
	for (const stmt of blockStatements(def)) {
		switch (stmt.type) {
			case 'item_name': meta.name = fieldText(stmt, 'name'); break;
			case 'item_desc': meta.description = fieldText(stmt, 'description'); break;
			case 'item_location': meta.location = describeLocation(stmt.children[0]); break;
			case 'item_movability': meta.movability = describeMovability(childForField(stmt, 'movability')); break;
			case 'item_container': {
				const state = childForField(stmt, 'state');
				meta.containerState = state ? fieldText(state, 'value') : null;
				break;
			}
			case 'item_ability': {
				const ability = fieldText(stmt, 'ability');
				const target = fieldText(stmt, 'target_id');
				if (ability) meta.abilities.push(target ? `${ability} (${target})` : ability);
				break;
			}
			case 'item_requires': {
				const ability = fieldText(stmt, 'ability');
				const interaction = fieldText(stmt, 'interaction');
				if (ability && interaction) meta.requirements.push(`${ability} -> ${interaction}`);
				break;
			}
		}
	}
	return meta;
}

function readNpc(def: SyntaxNode): SymbolMetadata {
	let name: string | null = null;
	let description: string | null = null;
	let location: string | null = null;
	let state: string | null = null;
	for (const stmt of blockStatements(def)) {
		switch (stmt.type) {
			case 'npc_name': name = fieldText(stmt, 'name'); break;
			case 'npc_desc': description = fieldText(stmt, 'description'); break;
			case 'npc_location': location = describeLocation(stmt.children[0]); break;
			case 'npc_state_stmt': state = describeNpcState(childForField(stmt, 'state')); break;
		}
	}
	return { kind: 'npc', name, description, location, state };
}

function readFlag(action: SyntaxNode): SymbolMetadata {
	const trigger = findAncestor(action, n => n.type === 'trigger_def');
	const limit = action.type === 'action_add_seq' ? fieldText(action, 'limit') : null;
	const parsedLimit = limit === null ? NaN : parseInt(limit, 10);
	return {
		kind: 'flag',
		trigger: trigger ? fieldText(trigger, 'name') : null,
		sequence: action.type === 'action_add_seq',
		sequenceLimit: Number.isFinite(parsedLimit) ? parsedLimit : null,
	};
}

const OUTLINE_SOURCES: Record<string, { type: OutlineEntry['type']; field: string | null }> = {
	trigger_def: { type: 'trigger', field: 'name' },
	spinner_def: { type: 'spinner', field: 'name' },
	goal_def: { type: 'goal', field: 'goal_id' },
	set_decl: { type: 'set', field: 'name' },
	game_def: { type: 'game', field: null },
};

function readOutline(tree: Tree): OutlineEntry[] {
	const out: OutlineEntry[] = [];
	for (const node of tree.root.children) {
		const source = OUTLINE_SOURCES[node.type];
		if (!source) continue;
		const nameNode = source.field ? childForField(node, source.field) : null;
		const name = nameNode ? nonEmpty(nameNode.text) : 'game';
		if (!name) continue;
		out.push({
			name,
			detail: source.type,
			type: source.type,
			range: tree.lines.rangeOf(node.span),
			selectionRange: tree.lines.rangeOf((nameNode ?? node).span),
		});
	}
	return out;
}

function readRoomSets(tree: Tree): string[] {
	const out: string[] = [];
	for (const node of tree.root.children) {
		if (node.type !== 'set_decl') continue;
		const name = fieldText(node, 'name');
		if (name) out.push(name);
	}
	return out;
}

// `start room` statements of every `game { player { … } }` block
function readPlayerStarts(tree: Tree, uri: string): PlayerStart[] {
	const out: PlayerStart[] = [];
	for (const game of tree.root.children) {
		if (game.type !== 'game_def') continue;
		for (const player of blockStatements(game)) {
			if (player.type !== 'game_player') continue;
			for (const stmt of blockStatements(player)) {
				if (stmt.type !== 'player_start') continue;
				const room = fieldText(stmt, 'room_id');
				if (room) out.push({ room, uri, range: tree.lines.rangeOf(stmt.span) });
			}
		}
	}
	return out;
}
