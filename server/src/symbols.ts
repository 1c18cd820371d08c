import { DocumentSymbol, SymbolKind as LspSymbolKind, type Range } from 'vscode-languageserver/node';
import type { FileFacts, OutlineEntry } from './analysisTypes';
import { KIND_LABELS, type SymbolKind } from './kinds';

const KIND_ICONS: Record<SymbolKind, LspSymbolKind> = {
	room: LspSymbolKind.Namespace,
	item: LspSymbolKind.Object,
	npc: LspSymbolKind.Class,
	flag: LspSymbolKind.Boolean,
};

const OUTLINE_ICONS: Record<OutlineEntry['type'], LspSymbolKind> = {
	trigger: LspSymbolKind.Event,
	spinner: LspSymbolKind.Enum,
	goal: LspSymbolKind.Struct,
	set: LspSymbolKind.Array,
	game: LspSymbolKind.File,
};

function before(a: Range, b: Range): number {
	return a.start.line - b.start.line || a.start.character - b.start.character;
}

/** Definitions and other named constructs of a file, flat and in document order. */
export function documentSymbols(facts: FileFacts): DocumentSymbol[] {
	const out: DocumentSymbol[] = [];
	for (const d of facts.definitions) {
		out.push(DocumentSymbol.create(d.name, KIND_LABELS[d.kind], KIND_ICONS[d.kind], d.fullRange, d.range));
	}
	for (const o of facts.outline) {
		out.push(DocumentSymbol.create(o.name, o.detail, OUTLINE_ICONS[o.type], o.range, o.selectionRange));
	}
	return out.sort((a, b) => before(a.range, b.range) || before(a.selectionRange, b.selectionRange));
}
