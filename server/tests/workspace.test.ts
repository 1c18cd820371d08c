import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { bundledGrammar } from '../src/ast/grammar';
import { Parser, type Tree } from '../src/ast/parser';
import { nodeFs, pathToUri } from '../src/scanner';
import { MemoryFs, RecordingLogger, makeWorkspace, worldUri } from './testUtils';

const A = 'room hall {\n    name "Hall"\n    desc "A long hall."\n}\n';
// Fails on any text mentioning `broken`.
class PickyParser extends Parser {
	parse(text: string): Tree {
		if (text.includes('broken')) throw new Error('cannot parse');
		return super.parse(text);
	}
}

const B = 'room kitchen {\n    name "Kitchen"\n    desc "Pots everywhere."\n    exit west -> hall\n}\n';

describe('workspace scanning', () => {
	it('indexes the siblings of the first opened file', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B, 'notes.txt': 'room hall {}' });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('b.amble'), B, 1);
		expect(ws.symbols.lookupDefinition('room', 'hall')?.uri).toBe(worldUri('a.amble'));
		expect(ws.indexedFiles().sort()).toEqual([worldUri('a.amble'), worldUri('b.amble')]);
		// the open buffer is used instead of the disk copy
		expect(fsys.reads).toEqual(['/world/a.amble']);
		expect(ws.scannedDirectories()).toEqual(['/world']);
	});

	it('shares the first scan of a directory between files opened together', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B, 'c.amble': 'room cellar {\n}\n' });
		const ws = makeWorkspace(fsys);
		await Promise.all([ws.open(worldUri('a.amble'), A), ws.open(worldUri('b.amble'), B)]);
		expect(fsys.reads).toEqual(['/world/c.amble']);
		expect(ws.symbols.lookupDefinition('room', 'cellar')).toBeDefined();
	});

	it('skips unreadable files with a warning', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B });
		fsys.unreadable.add('/world/a.amble');
		const logger = new RecordingLogger();
		const ws = makeWorkspace(fsys, { logger });
		await ws.open(worldUri('b.amble'), B);
		expect(ws.symbols.lookupDefinition('room', 'hall')).toBeUndefined();
		expect(logger.lines).toContain(
			"warn Skipping unreadable file /world/a.amble: EACCES: permission denied, open '/world/a.amble'",
		);
	});

	it('gives a contested name to the file opened first', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'z.amble': A });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('z.amble'), A);
		expect(ws.symbols.lookupDefinition('room', 'hall')?.uri).toBe(worldUri('z.amble'));
		expect(ws.symbols.index('room').duplicates('hall').map(d => d.uri)).toEqual([worldUri('a.amble')]);
	});

	it('clears the entries of files deleted from disk on save', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('b.amble'), B);
		fsys.remove('a.amble');
		const dirs = await ws.save(worldUri('b.amble'));
		expect(dirs).toEqual(['/world']);
		expect(ws.symbols.lookupDefinition('room', 'hall')).toBeUndefined();
		expect(ws.getFacts(worldUri('a.amble'))).toBeUndefined();
	});

	it('keeps the entries of a closed file', async () => {
		const fsys = new MemoryFs({ 'a.amble': A });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('a.amble'), A);
		ws.close(worldUri('a.amble'));
		expect(ws.getDocument(worldUri('a.amble'))).toBeUndefined();
		expect(ws.symbols.lookupDefinition('room', 'hall')?.uri).toBe(worldUri('a.amble'));
	});

	it('re-indexes only the changed file', async () => {
		const fsys = new MemoryFs({ 'a.amble': A, 'b.amble': B });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('b.amble'), B);
		const reads = fsys.reads.length;
		ws.change(worldUri('b.amble'), B.replace('-> hall', '-> cellar'), 2);
		expect(fsys.reads.length).toBe(reads);
		expect(ws.symbols.index('room').references('hall')).toEqual([]);
		expect(ws.symbols.index('room').references('cellar').map(r => r.uri)).toEqual([worldUri('b.amble')]);
		expect(ws.getDocument(worldUri('b.amble'))?.version).toBe(2);
	});

	it('picks up new files on a rescan', async () => {
		const fsys = new MemoryFs({ 'a.amble': A });
		const ws = makeWorkspace(fsys);
		await ws.open(worldUri('a.amble'), A);
		fsys.write('c.amble', 'room cellar {\n}\n');
		await ws.rescanAll();
		expect(ws.symbols.lookupDefinition('room', 'cellar')?.uri).toBe(worldUri('c.amble'));
	});

	it('scans only files with the configured extension', async () => {
		const fsys = new MemoryFs({ 'a.world': A, 'b.amble': B });
		const ws = makeWorkspace(fsys, { extension: '.world' });
		await ws.open(worldUri('a.world'), A);
		expect(fsys.reads).toEqual([]);
		expect(ws.indexedFiles()).toEqual([worldUri('a.world')]);
	});

	it('retries the first scan of a directory after it failed', async () => {
		const fsys = new MemoryFs({ 'a.amble': 'room broken {\n}\n', 'b.amble': B });
		const logger = new RecordingLogger();
		const ws = makeWorkspace(fsys, { parser: new PickyParser(bundledGrammar()), logger });
		await expect(ws.open(worldUri('b.amble'), B)).rejects.toThrow('cannot parse');
		expect(ws.scannedDirectories()).toEqual([]);
		expect(logger.lines).toContain('error Scan of /world failed: cannot parse');

		fsys.write('a.amble', A);
		await ws.open(worldUri('b.amble'), B);
		expect(ws.scannedDirectories()).toEqual(['/world']);
		expect(ws.symbols.lookupDefinition('room', 'hall')?.uri).toBe(worldUri('a.amble'));
	});

	it('indexes unsaved documents without scanning', async () => {
		const fsys = new MemoryFs({ 'a.amble': A });
		const ws = makeWorkspace(fsys);
		await ws.open('untitled:Untitled-1', B);
		expect(fsys.reads).toEqual([]);
		expect(ws.scannedDirectories()).toEqual([]);
		expect(ws.symbols.lookupDefinition('room', 'kitchen')?.uri).toBe('untitled:Untitled-1');
	});
});

describe('workspace on disk', () => {
	let dir = '';

	afterEach(() => {
		if (dir) fs.rmSync(dir, { recursive: true, force: true });
		dir = '';
	});

	it('reads sibling files through the node file system', async () => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'amble-ws-'));
		fs.writeFileSync(path.join(dir, 'a.amble'), A);
		fs.writeFileSync(path.join(dir, 'b.amble'), B);
		fs.mkdirSync(path.join(dir, 'nested.amble'));
		const ws = makeWorkspace(nodeFs);
		const bUri = pathToUri(path.join(dir, 'b.amble'));
		await ws.open(bUri, B);
		expect(ws.symbols.lookupDefinition('room', 'hall')?.uri).toBe(pathToUri(path.join(dir, 'a.amble')));

		fs.unlinkSync(path.join(dir, 'a.amble'));
		await ws.save(bUri);
		expect(ws.symbols.lookupDefinition('room', 'hall')).toBeUndefined();
	});
});
