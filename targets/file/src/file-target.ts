/**
 * File target: appends one line per entry, rotating by size.
 *
 * Writes are synchronous so that an entry is on disk once process()
 * returns, including the entries delivered right before a fatal exit.
 */

import { closeSync, existsSync, fstatSync, mkdirSync, openSync, renameSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import {
	type Entry,
	type ErrorWriter,
	type Target,
	type TargetFilter,
	type TargetFilterOptions,
	createTargetFilter,
} from '@relaylog/sdk';

export const DEFAULT_MAX_BYTES = 1 << 20;
export const DEFAULT_BACKUP_COUNT = 10;

export interface FileTargetOptions extends TargetFilterOptions {
	/** Log file path */
	path: string;
	/** Rotate before a write would grow the file past this size; 0 disables rotation (default: 1 MiB) */
	maxBytes?: number;
	/** Rotated files kept as path.1 … path.N; 0 truncates instead (default: 10) */
	backupCount?: number;
}

export class FileTarget implements Target {
	readonly id = 'file';
	readonly path: string;
	private readonly maxBytes: number;
	private readonly backupCount: number;
	private readonly accepts: TargetFilter;
	private errorWriter: ErrorWriter | null = null;
	private fd: number | null = null;
	private size = 0;

	constructor(options: FileTargetOptions) {
		this.path = options.path;
		this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
		this.backupCount = options.backupCount ?? DEFAULT_BACKUP_COUNT;
		this.accepts = createTargetFilter(options);
	}

	open(errorWriter: ErrorWriter): void {
		if (!this.path) throw new Error('file target requires a path');
		if (!Number.isInteger(this.maxBytes) || this.maxBytes < 0) {
			throw new Error('maxBytes must be a non-negative integer');
		}
		if (!Number.isInteger(this.backupCount) || this.backupCount < 0) {
			throw new Error('backupCount must be a non-negative integer');
		}
		mkdirSync(dirname(this.path), { recursive: true });
		this.openFile('a');
		this.errorWriter = errorWriter;
	}

	process(entry: Entry): void {
		if (this.errorWriter === null || !this.accepts(entry)) return;
		const line = `${entry.formattedMessage}\n`;
		const bytes = Buffer.byteLength(line);
		if (this.maxBytes > 0 && this.size > 0 && this.size + bytes > this.maxBytes) {
			try {
				this.rotate();
			} catch (err) {
				this.report(err);
			}
		}
		try {
			// A failed rotation leaves no descriptor: keep appending to the current file
			const fd = this.fd ?? this.openFile('a');
			writeSync(fd, line);
			this.size += bytes;
		} catch (err) {
			this.report(err);
		}
	}

	close(): void {
		if (this.fd !== null) closeSync(this.fd);
		this.fd = null;
		this.errorWriter = null;
	}

	private openFile(flags: 'a' | 'w'): number {
		const fd = openSync(this.path, flags);
		this.fd = fd;
		this.size = fstatSync(fd).size;
		return fd;
	}

	private report(err: unknown): void {
		const message = err instanceof Error ? err.message : String(err);
		this.errorWriter?.write(`file target: ${this.path}: ${message}\n`);
	}

	/** Shift path.N-1 → path.N … path → path.1, then start a fresh file. */
	private rotate(): void {
		if (this.fd !== null) closeSync(this.fd);
		this.fd = null;

		if (this.backupCount === 0) {
			this.openFile('w');
			return;
		}
		for (let i = this.backupCount - 1; i >= 1; i--) {
			const from = `${this.path}.${i}`;
			if (existsSync(from)) renameSync(from, `${this.path}.${i + 1}`);
		}
		renameSync(this.path, `${this.path}.1`);
		this.openFile('a');
	}
}
