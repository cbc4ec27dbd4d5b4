/**
 * Console target: one colored line per entry for development.
 *
 * Writes to process.stdout unless another stream is given.
 */

import {
	type Entry,
	type ErrorWriter,
	Level,
	type Target,
	type TargetFilter,
	type TargetFilterOptions,
	createTargetFilter,
} from '@relaylog/sdk';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

export interface ConsoleTargetOptions extends TargetFilterOptions {
	/** true/false force ANSI colors on or off; 'auto' follows terminal detection (default) */
	color?: boolean | 'auto';
	/** Output stream (default: process.stdout) */
	stream?: { write(chunk: string): unknown };
}

type Paint = (text: string) => string;

function palette(c: ChalkInstance): Record<Level, Paint> {
	return {
		[Level.Fatal]: c.magenta,
		[Level.Error]: c.red,
		[Level.Warn]: c.yellow,
		[Level.Info]: c.green,
		[Level.Debug]: c.cyan,
	};
}

function chalkFor(color: boolean | 'auto'): ChalkInstance {
	if (color === 'auto') return chalk;
	return new Chalk({ level: color ? 1 : 0 });
}

export class ConsoleTarget implements Target {
	readonly id = 'console';
	private readonly stream: { write(chunk: string): unknown };
	private readonly paint: Record<Level, Paint>;
	private readonly accepts: TargetFilter;
	private errorWriter: ErrorWriter | null = null;

	constructor(options: ConsoleTargetOptions = {}) {
		this.stream = options.stream ?? process.stdout;
		this.paint = palette(chalkFor(options.color ?? 'auto'));
		this.accepts = createTargetFilter(options);
	}

	open(errorWriter: ErrorWriter): void {
		this.errorWriter = errorWriter;
	}

	process(entry: Entry): void {
		if (!this.accepts(entry)) return;
		try {
			this.stream.write(`${this.paint[entry.level](entry.formattedMessage)}\n`);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			this.errorWriter?.write(`console target: write failed: ${message}\n`);
		}
	}

	close(): void {
		// Console output is unbuffered: nothing to flush
		this.errorWriter = null;
	}
}
