/**
 * Logger: the per-category handle callers log through.
 *
 * Loggers are cheap: each one is a category and a formatter over a shared
 * DispatchEngine. Loggers derived with getLogger() share their parent's
 * engine, so engine-level settings changed through one logger (sync(),
 * setLevel(), setTarget(), addTarget(), setFatalAction(), close()) apply
 * to all of them.
 */

import {
	type FatalAction,
	type Formatter,
	Level,
	type LoggerContext,
	type Target,
	getLevel,
} from '@relaylog/sdk';
import { ConsoleTarget } from '@relaylog/target-console';
import { DispatchEngine, type EngineOptions } from './engine.js';
import { concatArgs, formatTemplate, normalFormatter } from './format.js';
import { LoggerWriter } from './writer.js';

export const DEFAULT_CATEGORY = 'app';

export class Logger implements LoggerContext {
	readonly engine: DispatchEngine;
	readonly category: string;
	readonly formatter: Formatter;

	constructor(engine: DispatchEngine, category = DEFAULT_CATEGORY, formatter: Formatter = normalFormatter) {
		this.engine = engine;
		this.category = category;
		this.formatter = formatter;
	}

	/**
	 * Create a logger with another category sharing this logger's engine.
	 * The formatter is inherited unless one is given.
	 */
	getLogger(category: string, formatter?: Formatter): Logger {
		return new Logger(this.engine, category, formatter ?? this.formatter);
	}

	// ─── Engine settings (shared by every logger on the engine) ──────────────

	/** Deliver entries on the calling path instead of through the queue. */
	sync(enabled = true): void {
		this.engine.syncMode = enabled;
	}

	/**
	 * Set the most verbose level logged, by name (case-insensitive).
	 * Unknown names leave the level unchanged; returns whether it was applied.
	 */
	setLevel(name: string): boolean {
		const level = getLevel(name);
		if (level === undefined) return false;
		this.engine.maxLevel = level;
		return true;
	}

	setFatalAction(action: FatalAction): void {
		this.engine.fatalAction = action;
	}

	/** Replace the engine's targets (closes and reopens the engine). */
	setTarget(...targets: Target[]): Promise<void> {
		return this.engine.setTargets(...targets);
	}

	/** Append targets to the engine (closes and reopens the engine). */
	addTarget(...targets: Target[]): Promise<void> {
		return this.engine.addTargets(...targets);
	}

	open(): Promise<void> {
		return this.engine.open();
	}

	close(): Promise<void> {
		return this.engine.close();
	}

	flush(): Promise<void> {
		return this.engine.flush();
	}

	// ─── Positional forms ─────────────────────────────────────────────────────

	/**
	 * Log a fatal condition. The entry is delivered at once, every entry
	 * logged before it is drained, then the engine's fatal action runs.
	 */
	fatal(...args: unknown[]): Promise<void> {
		return this.emit(Level.Fatal, concatArgs(args));
	}

	error(...args: unknown[]): Promise<void> {
		return this.emit(Level.Error, concatArgs(args));
	}

	warn(...args: unknown[]): Promise<void> {
		return this.emit(Level.Warn, concatArgs(args));
	}

	info(...args: unknown[]): Promise<void> {
		return this.emit(Level.Info, concatArgs(args));
	}

	debug(...args: unknown[]): Promise<void> {
		return this.emit(Level.Debug, concatArgs(args));
	}

	log(level: Level, ...args: unknown[]): Promise<void> {
		return this.emit(level, concatArgs(args));
	}

	// ─── Template forms ───────────────────────────────────────────────────────

	fatalf(format: string, ...args: unknown[]): Promise<void> {
		return this.emit(Level.Fatal, formatTemplate(format, args));
	}

	errorf(format: string, ...args: unknown[]): Promise<void> {
		return this.emit(Level.Error, formatTemplate(format, args));
	}

	warnf(format: string, ...args: unknown[]): Promise<void> {
		return this.emit(Level.Warn, formatTemplate(format, args));
	}

	infof(format: string, ...args: unknown[]): Promise<void> {
		return this.emit(Level.Info, formatTemplate(format, args));
	}

	debugf(format: string, ...args: unknown[]): Promise<void> {
		return this.emit(Level.Debug, formatTemplate(format, args));
	}

	logf(level: Level, format: string, ...args: unknown[]): Promise<void> {
		return this.emit(level, formatTemplate(format, args));
	}

	/**
	 * A stream that logs every chunk written to it as one message at `level`,
	 * minus a single trailing newline.
	 */
	writer(level: Level): LoggerWriter {
		return new LoggerWriter(this, level);
	}

	// Every public logging method calls this directly: call-stack capture
	// counts on exactly one frame between the caller and emit().
	private emit(level: Level, message: string): Promise<void> {
		return this.engine.enqueue(level, message, { logger: this, formatter: this.formatter });
	}
}

/**
 * Create a root logger with its own engine, opened before the promise resolves.
 *
 * Defaults: errorWriter process.stderr, bufferSize 1024, maxLevel Debug,
 * one ConsoleTarget, category "app", normalFormatter.
 */
export async function createLogger(
	category = DEFAULT_CATEGORY,
	options: EngineOptions = {},
	formatter: Formatter = normalFormatter,
): Promise<Logger> {
	const engine = new DispatchEngine({
		errorWriter: process.stderr,
		maxLevel: Level.Debug,
		...options,
		targets: options.targets ?? [new ConsoleTarget()],
	});
	await engine.open();
	return new Logger(engine, category, formatter);
}
