/**
 * @relaylog/target-console: registration entry point.
 */

import { type TargetRegistration, getLevel } from '@relaylog/sdk';
import { ConsoleTarget, type ConsoleTargetOptions } from './console-target.js';

/**
 * Map a config block (snake_case keys) to ConsoleTarget options.
 * The block is checked against the registration's configSchema first.
 */
export function parseConsoleConfig(config: Record<string, unknown>): ConsoleTargetOptions {
	const options: ConsoleTargetOptions = {};
	const { color, level, categories } = config;
	if (typeof color === 'boolean' || color === 'auto') options.color = color;
	if (typeof level === 'string') options.maxLevel = getLevel(level);
	if (Array.isArray(categories)) {
		options.categories = categories.filter((c): c is string => typeof c === 'string');
	}
	return options;
}

export function register(): TargetRegistration {
	return {
		id: 'console',
		create: (config) => new ConsoleTarget(parseConsoleConfig(config)),
		configSchema: {
			type: 'object',
			properties: {
				color: {
					oneOf: [{ type: 'boolean' }, { const: 'auto' }],
					description: 'Use ANSI colors in output.',
					default: 'auto',
				},
				level: {
					type: 'string',
					enum: ['fatal', 'error', 'warn', 'info', 'debug'],
					description: 'Most verbose level to display.',
					default: 'debug',
				},
				categories: {
					type: 'array',
					items: { type: 'string' },
					description: 'Categories to display; a trailing * matches by prefix.',
				},
			},
			additionalProperties: false,
		},
	};
}

export { ConsoleTarget } from './console-target.js';
export type { ConsoleTargetOptions } from './console-target.js';
