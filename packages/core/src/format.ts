/**
 * Message building and the built-in formatters.
 */

import { format, inspect } from 'node:util';
import { type EntryFields, type Formatter, levelName } from '@relaylog/sdk';

// ─── Messages ─────────────────────────────────────────────────────────────────

function stringify(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value instanceof Error) return value.message;
	if (typeof value === 'object' && value !== null) {
		return inspect(value, { breakLength: Number.POSITIVE_INFINITY });
	}
	return String(value);
}

/**
 * Concatenate positional arguments into a message.
 * A space separates two adjacent operands when neither is a string.
 */
export function concatArgs(args: readonly unknown[]): string {
	let message = '';
	let previousWasString = true;
	args.forEach((arg, i) => {
		const isString = typeof arg === 'string';
		if (i > 0 && !isString && !previousWasString) message += ' ';
		message += stringify(arg);
		previousWasString = isString;
	});
	return message;
}

/**
 * Expand a printf-style template (`%s`, `%d`, `%j`, `%o`, ...).
 * Without arguments the template is returned verbatim.
 */
export function formatTemplate(template: string, args: readonly unknown[]): string {
	return args.length > 0 ? format(template, ...args) : template;
}

// ─── Timestamps ───────────────────────────────────────────────────────────────

function pad(n: number, width = 2): string {
	return String(n).padStart(width, '0');
}

/** `YYYY-MM-DD HH:mm:ss` in local time */
export function formatLocalTime(time: Date): string {
	const date = `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())}`;
	return `${date} ${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
}

/** RFC 3339 in local time, without fractional seconds (`Z` for a zero offset) */
export function formatRfc3339(time: Date): string {
	const offset = -time.getTimezoneOffset();
	let zone = 'Z';
	if (offset !== 0) {
		const sign = offset > 0 ? '+' : '-';
		const abs = Math.abs(offset);
		zone = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
	}
	return `${formatLocalTime(time).replace(' ', 'T')}${zone}`;
}

// ─── Formatters ───────────────────────────────────────────────────────────────

function render(time: string, entry: EntryFields): string {
	return `${time}|${levelName(entry.level)}|${entry.category}|${entry.message}${entry.callStack}`;
}

/** `<RFC 3339 time>|<Level>|<category>|<message><call stack>` */
export const defaultFormatter: Formatter = (_logger, entry) =>
	render(formatRfc3339(entry.time), entry);

/** `<YYYY-MM-DD HH:mm:ss>|<Level>|<category>|<message><call stack>`, the logger default */
export const normalFormatter: Formatter = (_logger, entry) =>
	render(formatLocalTime(entry.time), entry);
