/**
 * Writable adapter that turns written chunks into log calls.
 */

import { Writable } from 'node:stream';
import type { Level } from '@relaylog/sdk';

/** The slice of Logger a writer needs */
interface LineLogger {
	log(level: Level, ...args: unknown[]): Promise<void>;
}

export class LoggerWriter extends Writable {
	readonly level: Level;
	private readonly logger: LineLogger;

	constructor(logger: LineLogger, level: Level) {
		super({ decodeStrings: false });
		this.logger = logger;
		this.level = level;
	}

	override _write(
		chunk: Buffer | string,
		_encoding: BufferEncoding,
		callback: (error?: Error | null) => void,
	): void {
		const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
		const line = text.endsWith('\n') ? text.slice(0, -1) : text;
		this.logger.log(this.level, line).then(
			() => callback(),
			(err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
		);
	}
}
