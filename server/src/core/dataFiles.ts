import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';

// Shared Ajv instance for the bundled data files (grammar, query catalogue).
export const ajv = new Ajv2020({ allErrors: true, strict: false });

// Bundled data lives in server/data, beside src/ when running from sources
// and back up out of dist/server/src/core when running the build.
export function bundledDataCandidates(fileName: string): string[] {
	return [
		path.resolve(__dirname, '..', '..', 'data', fileName),
		path.resolve(__dirname, '..', '..', '..', '..', 'server', 'data', fileName),
	];
}

function errnoCode(err: unknown): string | undefined {
	if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
	return undefined;
}

export async function readDataFile(fileName: string, explicitPath?: string): Promise<{ raw: string; resolvedPath: string }> {
	const candidates: string[] = [];
	if (explicitPath && explicitPath.trim()) candidates.push(path.resolve(explicitPath.trim()));
	else candidates.push(...bundledDataCandidates(fileName));
	let lastErr: unknown = null;
	const seen = new Set<string>();
	for (const candidate of candidates) {
		if (seen.has(candidate)) continue;
		seen.add(candidate);
		try {
			const raw = await fs.readFile(candidate, 'utf8');
			return { raw, resolvedPath: candidate };
		} catch (err) {
			lastErr = err;
			const code = errnoCode(err);
			if (code === 'ENOENT' || code === 'ENOTDIR') continue;
			throw err;
		}
	}
	throw lastErr instanceof Error ? lastErr : new Error(`Data file "${fileName}" could not be resolved`);
}

/** Parses YAML (or JSON) text and validates it, throwing with every schema error listed. */
export function parseValidated<T>(raw: string, resolvedPath: string, validate: ValidateFunction<T>, label: string): T {
	const obj: unknown = yaml.load(raw, { json: true });
	if (obj === undefined || obj === null) {
		throw new Error(`${label} "${resolvedPath}" appears to be empty or could not be parsed`);
	}
	if (!validate(obj)) {
		const msg = (validate.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()).join('\n');
		throw new Error(`${label} "${resolvedPath}" failed schema validation:\n${msg}`);
	}
	return obj;
}
