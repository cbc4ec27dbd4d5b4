/**
 * Core types for relaylog: levels, entries, formatters and the error writer.
 */

// ─── Levels ───────────────────────────────────────────────────────────────────

/**
 * Severity levels, most severe first.
 *
 * A message is logged when its level is numerically less than or equal to
 * the configured maximum level.
 */
export enum Level {
	Fatal = 0,
	Error = 1,
	Warn = 2,
	Info = 3,
	Debug = 4,
}

export type LevelName = 'Fatal' | 'Error' | 'Warn' | 'Info' | 'Debug';

/** Display name of each level */
export const LEVEL_NAMES: Readonly<Record<Level, LevelName>> = {
	[Level.Fatal]: 'Fatal',
	[Level.Error]: 'Error',
	[Level.Warn]: 'Warn',
	[Level.Info]: 'Info',
	[Level.Debug]: 'Debug',
};

/** Levels keyed by lower-cased name */
export const LEVELS: ReadonlyMap<string, Level> = new Map([
	['fatal', Level.Fatal],
	['error', Level.Error],
	['warn', Level.Warn],
	['info', Level.Info],
	['debug', Level.Debug],
]);

/**
 * Resolve a level by name, case-insensitively.
 * Returns undefined for unknown names.
 */
export function getLevel(name: string): Level | undefined {
	return LEVELS.get(name.trim().toLowerCase());
}

/** Display name of a level, or "Unknown" for values outside the enum. */
export function levelName(level: number): LevelName | 'Unknown' {
	switch (level) {
		case Level.Fatal:
		case Level.Error:
		case Level.Warn:
		case Level.Info:
		case Level.Debug:
			return LEVEL_NAMES[level];
		default:
			return 'Unknown';
	}
}

// ─── Entries ──────────────────────────────────────────────────────────────────

/** Everything known about a log occurrence before it is formatted. */
export interface EntryFields {
	readonly level: Level;
	readonly category: string;
	readonly message: string;
	readonly time: Date;
	/** Rendered frames (`\n<file>:<line>` each), empty when none were captured */
	readonly callStack: string;
}

/** One log occurrence. Frozen once built. */
export interface Entry extends EntryFields {
	/** Display text produced by the logger's formatter on the calling path */
	readonly formattedMessage: string;
}

// ─── Formatting ───────────────────────────────────────────────────────────────

/** What a formatter may read from the logger that produced an entry. */
export interface LoggerContext {
	readonly category: string;
}

/** Renders an entry's display text. Called once per entry, before dispatch. */
export type Formatter = (logger: LoggerContext, entry: EntryFields) => string;

// ─── Engine surface ───────────────────────────────────────────────────────────

/**
 * Destination for diagnostics about the logging system itself
 * (targets that fail to open, throw while processing, ...).
 * `process.stderr` satisfies it.
 */
export interface ErrorWriter {
	write(chunk: string): unknown;
}

/**
 * What happens once a fatal entry has been delivered and every earlier entry drained.
 *
 * - `nothing`: the call resolves and the program continues
 * - `panic`: the call rejects with a FatalError
 * - `exit`: a final "Forced to exit." warning is delivered and the process exits with status 1
 */
export type FatalAction = 'nothing' | 'panic' | 'exit';

export const FATAL_ACTIONS: readonly FatalAction[] = ['nothing', 'panic', 'exit'];

export function isFatalAction(value: unknown): value is FatalAction {
	return FATAL_ACTIONS.some((action) => action === value);
}
