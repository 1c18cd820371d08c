import fs from 'node:fs';

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

// Subset of the connection's RemoteConsole the logger writes to.
export interface ConsoleSink {
	log(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

/** Prefixed logging to the client console, optionally mirrored to a file. */
export class ServerLogger implements Logger {
	private debugEnabled = false;
	private logFile = '';

	constructor(private readonly sink: ConsoleSink, private readonly prefix = '[amble-lsp]') {}

	configure(opts: { debug: boolean; logFile: string }): void {
		this.debugEnabled = opts.debug;
		this.logFile = opts.logFile;
	}

	debug(message: string): void {
		if (this.debugEnabled) this.write('debug', message);
	}

	info(message: string): void {
		this.write('info', message);
	}

	warn(message: string): void {
		this.write('warn', message);
	}

	error(message: string): void {
		this.write('error', message);
	}

	private write(level: Level, message: string): void {
		const line = `${this.prefix} ${message}`;
		switch (level) {
			case 'debug': this.sink.log(line); break;
			case 'info': this.sink.info(line); break;
			case 'warn': this.sink.warn(line); break;
			case 'error': this.sink.error(line); break;
		}
		if (!this.logFile) return;
		try {
			fs.appendFileSync(this.logFile, `${new Date().toISOString()} ${level} ${message}\n`);
		} catch (err) {
			if (this.debugEnabled) this.sink.warn(`${this.prefix} failed to append to ${this.logFile}: ${String(err)}`);
		}
	}
}

export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
