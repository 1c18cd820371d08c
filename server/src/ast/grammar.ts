/*
	Grammar table for Amble sources.

	The rules live in data/grammar.yaml as ordered alternatives, each mapping a node type to a
	pattern string. Patterns are compiled once into Element lists that the parser walks.

	Pattern syntax:
	  word | a|b          keyword (no node); `field=a|b` also emits a `keyword` leaf
	  ( ) , = % -> '{'    punctuation (braces must be quoted, bare `{rule}` is a block)
	  {rule}              brace block of `rule` statements, emitted as a `block` node
	  [ … ]               optional group
	  $room $item …       symbol reference (ref node wrapping an identifier leaf)
	  $room!              symbol definition (bare identifier leaf)
	  $string[:type] $number $bool $ident:type   literal leaves
	  @rule               sub-rule
	  suffixes            `,+` comma list, `+` one or more, `*` zero or more (rules only)
	  field=…             names the produced node(s) within the parent
	Node types starting with `_` are transparent: their children are spliced into the parent.
*/
import fs from 'node:fs';
import schema from '../../data/grammar.schema.json';
import { ajv, bundledDataCandidates, parseValidated, readDataFile } from '../core/dataFiles';
import { PUNCTUATION, type Punct } from '../core/tokens';

export interface SymbolShape {
	// node type wrapping a reference
	reference: string;
	// identifier leaf type, shared by definitions and references
	identifier: string;
}

export interface GrammarFile {
	start: string;
	symbols: Record<string, SymbolShape>;
	rules: Record<string, Array<Record<string, string>>>;
}

export type Slot =
	| { kind: 'reference'; symbol: string; node: string; identifier: string }
	| { kind: 'definition'; symbol: string; identifier: string }
	| { kind: 'string'; node: string }
	| { kind: 'number' }
	| { kind: 'boolean' }
	| { kind: 'identifier'; node: string };

// once; `,+` comma separated; `+` one or more; `*` zero or more
export type Repeat = 'once' | 'comma' | 'many' | 'any';

export type Element =
	| { type: 'keyword'; values: readonly string[]; field: string | null }
	| { type: 'punct'; value: Punct }
	| { type: 'slot'; slot: Slot; field: string | null; repeat: Repeat }
	| { type: 'rule'; rule: string; field: string | null; repeat: Repeat }
	| { type: 'optional'; elements: Element[] }
	| { type: 'block'; rule: string };

export interface Form {
	node: string;
	transparent: boolean;
	pattern: Element[];
}

const SLOT_RE = /^(?:([a-z_]+)=)?\$([a-z_]+)(!)?(?::([a-z_]+))?(,\+|\+)?$/;
const RULE_RE = /^(?:([a-z_]+)=)?@([a-z_]+)(,\+|\+|\*)?$/;
const BLOCK_RE = /^\{([a-z_]+)\}$/;
const KEYWORD_RE = /^(?:([a-z_]+)=)?([A-Za-z_][\w-]*(?:\|[A-Za-z_][\w-]*)*)$/;
const QUOTED_RE = /^'(.+)'$/;

function asPunct(value: string): Punct | null {
	return PUNCTUATION.find(p => p === value) ?? null;
}

function toRepeat(suffix: string | undefined): Repeat {
	switch (suffix) {
		case ',+': return 'comma';
		case '+': return 'many';
		case '*': return 'any';
		default: return 'once';
	}
}

export class Grammar {
	readonly start: string;
	readonly symbols: ReadonlyMap<string, SymbolShape>;
	// every word a pattern matches literally
	readonly keywords: ReadonlySet<string>;
	private readonly rules = new Map<string, Form[]>();
	private readonly leading = new Map<string, Set<string>>();

	constructor(file: GrammarFile) {
		this.start = file.start;
		this.symbols = new Map(Object.entries(file.symbols));
		const keywords = new Set<string>();
		for (const [name, alternatives] of Object.entries(file.rules)) {
			const forms: Form[] = [];
			for (const alternative of alternatives) {
				for (const [node, pattern] of Object.entries(alternative)) {
					forms.push({
						node,
						transparent: node.startsWith('_'),
						pattern: this.compile(pattern, `${name}.${node}`, keywords),
					});
				}
			}
			this.rules.set(name, forms);
		}
		this.keywords = keywords;
		this.checkReferences();
	}

	forms(rule: string): readonly Form[] {
		return this.rules.get(rule) ?? [];
	}

	/** Words a statement of `rule` can start with. */
	leadingKeywords(rule: string): ReadonlySet<string> {
		const cached = this.leading.get(rule);
		if (cached) return cached;
		const out = new Set<string>();
		this.collectFirst(rule, out, new Set());
		this.leading.set(rule, out);
		return out;
	}

	private collectFirst(rule: string, out: Set<string>, visiting: Set<string>): void {
		if (visiting.has(rule)) return;
		visiting.add(rule);
		for (const form of this.forms(rule)) this.firstOfSequence(form.pattern, out, visiting);
	}

	private firstOfSequence(elements: Element[], out: Set<string>, visiting: Set<string>): void {
		for (const el of elements) {
			switch (el.type) {
				case 'keyword':
					for (const v of el.values) out.add(v);
					return;
				case 'optional':
					this.firstOfSequence(el.elements, out, visiting);
					continue;
				case 'rule':
					this.collectFirst(el.rule, out, visiting);
					if (el.repeat === 'any') continue;
					return;
				default:
					return;
			}
		}
	}

	private compile(pattern: string, where: string, keywords: Set<string>): Element[] {
		const stack: Element[][] = [[]];
		const top = () => stack[stack.length - 1];
		for (const part of pattern.trim().split(/\s+/)) {
			if (part === '[') { stack.push([]); continue; }
			if (part === ']') {
				if (stack.length < 2) throw new Error(`Grammar ${where}: unbalanced ']'`);
				const elements = stack.pop() ?? [];
				top().push({ type: 'optional', elements });
				continue;
			}
			const quoted = QUOTED_RE.exec(part);
			const punct = asPunct(quoted ? quoted[1] : part);
			if (punct && (quoted || (punct !== '{' && punct !== '}'))) {
				top().push({ type: 'punct', value: punct });
				continue;
			}
			const block = BLOCK_RE.exec(part);
			if (block) { top().push({ type: 'block', rule: block[1] }); continue; }
			const slot = SLOT_RE.exec(part);
			if (slot) {
				top().push({ type: 'slot', slot: this.compileSlot(slot[2], !!slot[3], slot[4], where), field: slot[1] ?? null, repeat: toRepeat(slot[5]) });
				continue;
			}
			const rule = RULE_RE.exec(part);
			if (rule) {
				top().push({ type: 'rule', rule: rule[2], field: rule[1] ?? null, repeat: toRepeat(rule[3]) });
				continue;
			}
			const kw = KEYWORD_RE.exec(part);
			if (kw) {
				const values = kw[2].split('|');
				for (const v of values) keywords.add(v);
				top().push({ type: 'keyword', values, field: kw[1] ?? null });
				continue;
			}
			throw new Error(`Grammar ${where}: cannot read pattern element '${part}'`);
		}
		if (stack.length !== 1) throw new Error(`Grammar ${where}: unbalanced '['`);
		return stack[0];
	}

	private compileSlot(name: string, definition: boolean, leaf: string | undefined, where: string): Slot {
		const shape = this.symbols.get(name);
		if (shape) {
			return definition
				? { kind: 'definition', symbol: name, identifier: shape.identifier }
				: { kind: 'reference', symbol: name, node: shape.reference, identifier: shape.identifier };
		}
		switch (name) {
			case 'string': return { kind: 'string', node: leaf ?? 'string' };
			case 'number': return { kind: 'number' };
			case 'bool': return { kind: 'boolean' };
			case 'ident':
				if (!leaf) throw new Error(`Grammar ${where}: $ident needs a leaf type`);
				return { kind: 'identifier', node: leaf };
			default:
				throw new Error(`Grammar ${where}: unknown slot '$${name}'`);
		}
	}

	private checkReferences(): void {
		if (!this.rules.has(this.start)) throw new Error(`Grammar start rule '${this.start}' is not defined`);
		const visit = (elements: Element[], owner: string) => {
			for (const el of elements) {
				if (el.type === 'optional') visit(el.elements, owner);
				else if ((el.type === 'rule' || el.type === 'block') && !this.rules.has(el.rule)) {
					throw new Error(`Grammar rule '${owner}' refers to undefined rule '${el.rule}'`);
				}
			}
		};
		for (const [name, forms] of this.rules) {
			for (const form of forms) visit(form.pattern, name);
		}
	}
}

const validateGrammar = ajv.compile<GrammarFile>(schema);
const GRAMMAR_FILE = 'grammar.yaml';

export async function loadGrammar(explicitPath?: string): Promise<Grammar> {
	const { raw, resolvedPath } = await readDataFile(GRAMMAR_FILE, explicitPath);
	return new Grammar(parseValidated(raw, resolvedPath, validateGrammar, 'Grammar'));
}

let bundled: Grammar | null = null;

/** The bundled grammar, read synchronously once per process. */
export function bundledGrammar(): Grammar {
	if (bundled) return bundled;
	for (const candidate of bundledDataCandidates(GRAMMAR_FILE)) {
		if (!fs.existsSync(candidate)) continue;
		const raw = fs.readFileSync(candidate, 'utf8');
		bundled = new Grammar(parseValidated(raw, candidate, validateGrammar, 'Grammar'));
		return bundled;
	}
	throw new Error(`Grammar file "${GRAMMAR_FILE}" could not be resolved`);
}
