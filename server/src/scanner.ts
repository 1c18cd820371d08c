import fs from 'node:fs/promises';
import path from 'node:path';
import { URI } from 'vscode-uri';

/** File access the workspace scanner needs; tests substitute their own. */
export interface WorkspaceFs {
	readFile(filePath: string): Promise<string>;
	// names of the regular files directly inside `dir`
	listFiles(dir: string): Promise<string[]>;
}

export const nodeFs: WorkspaceFs = {
	readFile: filePath => fs.readFile(filePath, 'utf8'),
	async listFiles(dir) {
		const entries = await fs.readdir(dir, { withFileTypes: true });
		return entries.filter(e => e.isFile()).map(e => e.name);
	},
};

/** Directories to scan when a file is opened or saved. */
export type ScanRootPolicy = (filePath: string) => string[];

export const directoryPolicy: ScanRootPolicy = filePath => [path.dirname(filePath)];

/** Source files of a directory (non-recursive), sorted by name. */
export async function listSourceFiles(fsys: WorkspaceFs, dir: string, extension: string): Promise<string[]> {
	const names = await fsys.listFiles(dir);
	return names
		.filter(n => n.endsWith(extension) && n.length > extension.length)
		.sort()
		.map(n => path.join(dir, n));
}

export function normalizeUri(uri: string): string {
	return URI.parse(uri).toString();
}

export function uriToPath(uri: string): string | null {
	const u = URI.parse(uri);
	return u.scheme === 'file' ? u.fsPath : null;
}

export function pathToUri(filePath: string): string {
	return URI.file(filePath).toString();
}
