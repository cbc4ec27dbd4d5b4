/**
 * Test harness for relaylog target authors and engine tests.
 *
 * Provides mock implementations and helpers for exercising targets and
 * the dispatch engine in isolation.
 */

import { type BuildEntryOptions, buildEntry } from './entry.js';
import type { Target } from './target.js';
import { type Entry, type ErrorWriter, type Formatter, Level } from './types.js';

// ─── Mock Target ──────────────────────────────────────────────────────────────

/**
 * Mock target for testing.
 * Records every processed entry for assertion. Processing is synchronous
 * unless the target is paused.
 */
export class MockTarget implements Target {
	readonly id: string;
	readonly entries: Entry[] = [];
	openCount = 0;
	closeCount = 0;
	errorWriter: ErrorWriter | null = null;
	private openError: Error | null = null;
	private processError: Error | null = null;
	private gate: { promise: Promise<void>; release: () => void } | null = null;

	constructor(id = 'mock-target') {
		this.id = id;
	}

	/** Make subsequent open() calls throw */
	setOpenError(error: Error | null): void {
		this.openError = error;
	}

	/** Make subsequent process() calls throw (after recording the entry) */
	setProcessError(error: Error | null): void {
		this.processError = error;
	}

	/** Hold every subsequent process() call until resume() */
	pause(): void {
		if (this.gate) return;
		let release = () => {};
		const promise = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.gate = { promise, release };
	}

	/** Release every held process() call */
	resume(): void {
		this.gate?.release();
		this.gate = null;
	}

	open(errorWriter: ErrorWriter): void {
		if (this.openError) throw this.openError;
		this.errorWriter = errorWriter;
		this.openCount++;
	}

	process(entry: Entry): void | Promise<void> {
		this.entries.push(entry);
		if (this.processError) throw this.processError;
		if (this.gate) return this.gate.promise;
	}

	close(): void {
		this.closeCount++;
	}

	/** Messages of the processed entries, in delivery order */
	get messages(): string[] {
		return this.entries.map((e) => e.message);
	}

	/** Entries at a specific level */
	entriesAtLevel(level: Level): Entry[] {
		return this.entries.filter((e) => e.level === level);
	}
}

// ─── Mock Error Writer ────────────────────────────────────────────────────────

/**
 * Collects everything written to it.
 */
export class MockErrorWriter implements ErrorWriter {
	readonly chunks: string[] = [];

	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}

	/** Everything written so far, joined */
	get text(): string {
		return this.chunks.join('');
	}

	/** Written text split into lines, without the trailing empty line */
	get lines(): string[] {
		return this.text.split('\n').filter((line) => line.length > 0);
	}
}

// ─── Test Entry Factory ───────────────────────────────────────────────────────

const messageOnly: Formatter = (_logger, entry) => entry.message;

/**
 * Create a test entry with sensible defaults.
 * The formatted message equals the message unless a formatter is given.
 */
export function createTestEntry(
	overrides?: Partial<BuildEntryOptions>,
	formatter: Formatter = messageOnly,
): Entry {
	const options: BuildEntryOptions = {
		level: Level.Info,
		category: 'test',
		message: 'test message',
		time: new Date('2024-01-15T10:30:45.000Z'),
		...overrides,
	};
	return buildEntry(options, { category: options.category }, formatter);
}
