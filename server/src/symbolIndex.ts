import type { Location } from 'vscode-languageserver/node';
import type { Definition, Reference } from './analysisTypes';
import { SYMBOL_KINDS, type SymbolKind } from './kinds';

/**
 * Definitions and references of one symbol kind, keyed by name.
 *
 * The first definition of a name wins; later ones are kept as shadowed candidates so a
 * winner removed by a rescan of its file can be replaced by the next one in scan order.
 */
export class SymbolIndex {
	// index 0 is the winner
	private readonly defs = new Map<string, Definition[]>();
	private readonly refs = new Map<string, Reference[]>();

	constructor(readonly kind: SymbolKind) {}

	clearFile(uri: string): void {
		dropFile(this.defs, uri);
		dropFile(this.refs, uri);
		prune(this.defs);
		prune(this.refs);
	}

	/** Returns true when the definition became the winner for its name. */
	insertDefinition(def: Definition): boolean {
		const list = this.defs.get(def.name);
		if (!list || list.length === 0) {
			this.defs.set(def.name, [def]);
			return true;
		}
		list.push(def);
		return false;
	}

	insertReference(ref: Reference): void {
		const list = this.refs.get(ref.name);
		if (list) list.push(ref);
		else this.refs.set(ref.name, [ref]);
	}

	/**
	 * Swaps every entry of `uri` for the given ones in a single call. Names whose winner came
	 * from `uri` keep `uri` in front when it still defines them.
	 */
	replaceFile(uri: string, definitions: readonly Definition[], references: readonly Reference[]): void {
		const ownedWinners = new Set<string>();
		for (const [name, list] of this.defs) {
			if (list[0]?.uri === uri) ownedWinners.add(name);
		}
		dropFile(this.defs, uri);
		dropFile(this.refs, uri);

		const front = new Map<string, number>();
		for (const def of definitions) {
			if (def.kind !== this.kind) continue;
			const list = this.defs.get(def.name);
			if (!list) {
				this.defs.set(def.name, [def]);
				front.set(def.name, 1);
				continue;
			}
			if (ownedWinners.has(def.name)) {
				const at = front.get(def.name) ?? 0;
				list.splice(at, 0, def);
				front.set(def.name, at + 1);
			} else {
				list.push(def);
			}
		}
		for (const ref of references) {
			if (ref.kind === this.kind) this.insertReference(ref);
		}
		prune(this.defs);
		prune(this.refs);
	}

	lookupDefinition(name: string): Definition | undefined {
		return this.defs.get(name)?.[0];
	}

	lookupReferences(name: string, includeDefinition: boolean): Location[] {
		const out: Location[] = [];
		const def = includeDefinition ? this.lookupDefinition(name) : undefined;
		if (def) out.push({ uri: def.uri, range: def.range });
		for (const ref of this.refs.get(name) ?? []) out.push({ uri: ref.uri, range: ref.range });
		return out;
	}

	references(name: string): readonly Reference[] {
		return this.refs.get(name) ?? [];
	}

	/** Shadowed candidates of a name, in scan order. */
	duplicates(name: string): readonly Definition[] {
		return this.defs.get(name)?.slice(1) ?? [];
	}

	/** Winning definitions in insertion order. */
	definitions(): Definition[] {
		const out: Definition[] = [];
		for (const list of this.defs.values()) {
			if (list[0]) out.push(list[0]);
		}
		return out;
	}

	names(): string[] {
		return [...this.defs.keys()];
	}

	referencedNames(): string[] {
		return [...this.refs.keys()];
	}
}

function dropFile<T extends { uri: string }>(map: Map<string, T[]>, uri: string): void {
	for (const [name, list] of map) {
		if (list.some(e => e.uri === uri)) map.set(name, list.filter(e => e.uri !== uri));
	}
}

function prune<T>(map: Map<string, T[]>): void {
	for (const [name, list] of map) {
		if (list.length === 0) map.delete(name);
	}
}

/** The four per-kind indexes. */
export class SymbolStore {
	private readonly indexes: Record<SymbolKind, SymbolIndex> = {
		room: new SymbolIndex('room'),
		item: new SymbolIndex('item'),
		npc: new SymbolIndex('npc'),
		flag: new SymbolIndex('flag'),
	};

	index(kind: SymbolKind): SymbolIndex {
		return this.indexes[kind];
	}

	clearFile(uri: string): void {
		for (const kind of SYMBOL_KINDS) this.indexes[kind].clearFile(uri);
	}

	replaceFile(uri: string, definitions: readonly Definition[], references: readonly Reference[]): void {
		for (const kind of SYMBOL_KINDS) this.indexes[kind].replaceFile(uri, definitions, references);
	}

	insertDefinition(def: Definition): boolean {
		return this.indexes[def.kind].insertDefinition(def);
	}

	insertReference(ref: Reference): void {
		this.indexes[ref.kind].insertReference(ref);
	}

	lookupDefinition(kind: SymbolKind, name: string): Definition | undefined {
		return this.indexes[kind].lookupDefinition(name);
	}

	lookupReferences(kind: SymbolKind, name: string, includeDefinition: boolean): Location[] {
		return this.indexes[kind].lookupReferences(name, includeDefinition);
	}
}
