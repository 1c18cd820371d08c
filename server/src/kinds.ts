export const SYMBOL_KINDS = ['room', 'item', 'npc', 'flag'] as const;
export type SymbolKind = typeof SYMBOL_KINDS[number];

export const KIND_LABELS: Record<SymbolKind, string> = {
	room: 'Room',
	item: 'Item',
	npc: 'Npc',
	flag: 'Flag',
};

export type FlagName = {
	// name with any `#<digits>` sequence suffix removed
	base: string;
	// digits after `#`, when present
	sequence: number | null;
	// length of `base` in UTF-16 code units when a suffix was removed
	baseLength: number | null;
};

/** `quest#2` → base `quest`, sequence 2. A leading `#` or a missing base keeps the raw name. */
export function splitFlagName(raw: string): FlagName {
	const hash = raw.indexOf('#');
	if (hash <= 0) return { base: raw, sequence: null, baseLength: null };
	const digits = /^\d+/.exec(raw.slice(hash + 1));
	return {
		base: raw.slice(0, hash),
		sequence: digits ? Number(digits[0]) : null,
		baseLength: hash,
	};
}
