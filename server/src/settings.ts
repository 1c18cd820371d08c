import { type DiagCode, normalizeDiagCode } from './analysisTypes';

export type IndentSetting = 'auto' | 'tab' | number;

export interface FormatSettings {
	enabled: boolean;
	indent: IndentSetting;
}

export interface DiagToggles {
	undefinedReferences: boolean;
	syntax: boolean;
	unusedDefinitions: boolean;
	duplicateDefinitions: boolean;
	flagSequences: boolean;
	metadata: boolean;
	// one `start room` across the scanned files
	playerStart: boolean;
}

export interface AmbleSettings {
	extension: string;
	// override files for the bundled grammar and query catalogue
	grammarPath: string;
	queriesPath: string;
	debug: boolean;
	logFile: string;
	diag: DiagToggles;
	disabledDiagnostics: Set<DiagCode>;
	format: FormatSettings;
}

export function defaultSettings(): AmbleSettings {
	return {
		extension: '.amble',
		grammarPath: '',
		queriesPath: '',
		debug: false,
		logFile: '',
		diag: {
			undefinedReferences: true,
			syntax: true,
			unusedDefinitions: true,
			duplicateDefinitions: false,
			flagSequences: true,
			metadata: true,
			playerStart: true,
		},
		disabledDiagnostics: new Set(),
		format: { enabled: true, indent: 'auto' },
	};
}

// Parse user-provided disabled diagnostics (codes or friendly names) into canonical codes.
export function parseDisabledDiagList(input: unknown): Set<DiagCode> {
	const out = new Set<DiagCode>();
	const push = (raw: unknown) => {
		if (typeof raw !== 'string') return;
		const norm = normalizeDiagCode(raw);
		if (norm) out.add(norm);
	};
	if (Array.isArray(input)) {
		for (const it of input) push(it);
		return out;
	}
	if (typeof input === 'string') {
		for (const token of input.split(/[,\s]+/)) {
			if (token) push(token);
		}
	}
	return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bool(value: unknown, fallback: boolean): boolean {
	return typeof value === 'boolean' ? value : fallback;
}

function str(value: unknown, fallback: string): string {
	return typeof value === 'string' ? value : fallback;
}

function indent(value: unknown, fallback: IndentSetting): IndentSetting {
	if (value === 'auto' || value === 'tab') return value;
	if (typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= 16) return value;
	return fallback;
}

/**
 * Settings from the `amble` configuration section or the initialization options. Values of the
 * wrong type keep the one from `base`.
 */
export function normalizeSettings(input: unknown, base: AmbleSettings = defaultSettings()): AmbleSettings {
	const raw = isRecord(input) ? input : {};
	const diag = isRecord(raw.diag) ? raw.diag : {};
	const format = isRecord(raw.format) ? raw.format : {};
	const diagnostics = isRecord(raw.diagnostics) ? raw.diagnostics : {};

	let extension = str(raw.extension, base.extension).trim();
	if (!extension) extension = base.extension;
	else if (!extension.startsWith('.')) extension = `.${extension}`;

	return {
		extension,
		grammarPath: str(raw.grammarPath, base.grammarPath),
		queriesPath: str(raw.queriesPath, base.queriesPath),
		debug: bool(raw.debug, base.debug),
		logFile: str(raw.logFile, base.logFile),
		diag: {
			undefinedReferences: bool(diag.undefinedReferences, base.diag.undefinedReferences),
			syntax: bool(diag.syntax, base.diag.syntax),
			unusedDefinitions: bool(diag.unusedDefinitions, base.diag.unusedDefinitions),
			duplicateDefinitions: bool(diag.duplicateDefinitions, base.diag.duplicateDefinitions),
			flagSequences: bool(diag.flagSequences, base.diag.flagSequences),
			metadata: bool(diag.metadata, base.diag.metadata),
			playerStart: bool(diag.playerStart, base.diag.playerStart),
		},
		disabledDiagnostics: 'disable' in diagnostics
			? parseDisabledDiagList(diagnostics.disable)
			: new Set(base.disabledDiagnostics),
		format: {
			enabled: bool(format.enabled, base.format.enabled),
			indent: indent(format.indent, base.format.indent),
		},
	};
}
