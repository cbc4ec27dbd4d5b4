/**
 * Entry builder: the only way entries are created.
 */

import type { Entry, EntryFields, Formatter, Level, LoggerContext } from './types.js';

/** Options for building an entry */
export interface BuildEntryOptions {
	level: Level;
	category: string;
	message: string;
	time?: Date;
	callStack?: string;
}

/**
 * Build the unformatted fields of an entry.
 * Fills in defaults for time and callStack.
 */
export function buildEntryFields(options: BuildEntryOptions): EntryFields {
	return {
		level: options.level,
		category: options.category,
		message: options.message,
		time: options.time ?? new Date(),
		callStack: options.callStack ?? '',
	};
}

/**
 * Format an entry through the given formatter and freeze it.
 */
export function buildEntry(
	options: BuildEntryOptions,
	logger: LoggerContext,
	formatter: Formatter,
): Entry {
	const fields = buildEntryFields(options);
	return Object.freeze({ ...fields, formattedMessage: formatter(logger, fields) });
}
