/**
 * @relaylog/target-file: registration entry point.
 */

import { type TargetRegistration, getLevel } from '@relaylog/sdk';
import { FileTarget, type FileTargetOptions } from './file-target.js';

/**
 * Map a config block (snake_case keys) to FileTarget options.
 * The block is checked against the registration's configSchema first;
 * FileTarget.open() rejects a missing path or negative sizes.
 */
export function parseFileConfig(config: Record<string, unknown>): FileTargetOptions {
	const { path, max_bytes, backup_count, level, categories } = config;
	const options: FileTargetOptions = { path: typeof path === 'string' ? path : '' };
	if (typeof max_bytes === 'number') options.maxBytes = max_bytes;
	if (typeof backup_count === 'number') options.backupCount = backup_count;
	if (typeof level === 'string') options.maxLevel = getLevel(level);
	if (Array.isArray(categories)) {
		options.categories = categories.filter((c): c is string => typeof c === 'string');
	}
	return options;
}

export function register(): TargetRegistration {
	return {
		id: 'file',
		create: (config) => new FileTarget(parseFileConfig(config)),
		configSchema: {
			type: 'object',
			properties: {
				path: { type: 'string', description: 'Log file path.' },
				max_bytes: {
					type: 'integer',
					minimum: 0,
					description: 'Rotate before the file grows past this size; 0 disables rotation.',
					default: 1048576,
				},
				backup_count: {
					type: 'integer',
					minimum: 0,
					description: 'Rotated files to keep.',
					default: 10,
				},
				level: {
					type: 'string',
					enum: ['fatal', 'error', 'warn', 'info', 'debug'],
					description: 'Most verbose level to write.',
					default: 'debug',
				},
				categories: {
					type: 'array',
					items: { type: 'string' },
					description: 'Categories to write; a trailing * matches by prefix.',
				},
			},
			required: ['path'],
			additionalProperties: false,
		},
	};
}

export { FileTarget, DEFAULT_BACKUP_COUNT, DEFAULT_MAX_BYTES } from './file-target.js';
export type { FileTargetOptions } from './file-target.js';
