/**
 * Engine configuration from the environment and from YAML files.
 *
 * Config file shape:
 *
 *   level: warn
 *   buffer_size: 256
 *   call_stack_depth: 3
 *   call_stack_filter: src/
 *   sync: false
 *   fatal_action: exit
 *   targets:
 *     - type: console
 *       config:
 *         color: false
 */

import { readFile } from 'node:fs/promises';
import { type Level, type Target, type TargetRegistration, getLevel, isFatalAction } from '@relaylog/sdk';
import { Ajv, type ErrorObject } from 'ajv';
import yaml from 'js-yaml';
import type { EngineOptions } from './engine.js';
import { ConfigurationError } from './errors.js';

// ─── Field parsers ────────────────────────────────────────────────────────────

function parseLevel(field: string, value: unknown): Level {
	const level = typeof value === 'string' ? getLevel(value) : undefined;
	if (level === undefined) {
		throw new ConfigurationError(field, `unknown level ${JSON.stringify(value)}`);
	}
	return level;
}

function parseCount(field: string, value: unknown): number {
	const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
	if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
		throw new ConfigurationError(field, `expected a non-negative integer, got ${JSON.stringify(value)}`);
	}
	return n;
}

function parseBoolean(field: string, value: unknown): boolean {
	if (typeof value === 'boolean') return value;
	if (typeof value === 'string') {
		const v = value.trim().toLowerCase();
		if (v === '1' || v === 'true' || v === 'yes') return true;
		if (v === '0' || v === 'false' || v === 'no') return false;
	}
	throw new ConfigurationError(field, `expected a boolean, got ${JSON.stringify(value)}`);
}

function parseString(field: string, value: unknown): string {
	if (typeof value !== 'string') {
		throw new ConfigurationError(field, `expected a string, got ${JSON.stringify(value)}`);
	}
	return value;
}

function parseFatalAction(field: string, value: unknown): NonNullable<EngineOptions['fatalAction']> {
	if (!isFatalAction(value)) {
		throw new ConfigurationError(field, `expected nothing, panic or exit, got ${JSON.stringify(value)}`);
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Environment ──────────────────────────────────────────────────────────────

/**
 * Engine options from RELAYLOG_* environment variables. Unset variables
 * are left out so the result can be spread over other options.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): EngineOptions {
	const options: EngineOptions = {};
	if (env.RELAYLOG_LEVEL) options.maxLevel = parseLevel('RELAYLOG_LEVEL', env.RELAYLOG_LEVEL);
	if (env.RELAYLOG_BUFFER_SIZE) {
		options.bufferSize = parseCount('RELAYLOG_BUFFER_SIZE', env.RELAYLOG_BUFFER_SIZE);
	}
	if (env.RELAYLOG_CALL_STACK_DEPTH) {
		options.callStackDepth = parseCount('RELAYLOG_CALL_STACK_DEPTH', env.RELAYLOG_CALL_STACK_DEPTH);
	}
	if (env.RELAYLOG_CALL_STACK_FILTER !== undefined) {
		options.callStackFilter = env.RELAYLOG_CALL_STACK_FILTER;
	}
	if (env.RELAYLOG_SYNC) options.syncMode = parseBoolean('RELAYLOG_SYNC', env.RELAYLOG_SYNC);
	if (env.RELAYLOG_FATAL_ACTION) {
		options.fatalAction = parseFatalAction('RELAYLOG_FATAL_ACTION', env.RELAYLOG_FATAL_ACTION);
	}
	return options;
}

// ─── Config files ─────────────────────────────────────────────────────────────

const ajv = new Ajv({ allErrors: true });

function describeSchemaErrors(errors: ErrorObject[] | null | undefined): string {
	return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'is invalid'}`).join('; ');
}

function buildTargets(value: unknown, registrations: readonly TargetRegistration[]): Target[] {
	if (!Array.isArray(value)) {
		throw new ConfigurationError('targets', 'expected a list');
	}
	return value.map((def: unknown, i) => {
		const field = `targets[${i}]`;
		if (!isRecord(def)) throw new ConfigurationError(field, 'expected a mapping');
		const type = parseString(`${field}.type`, def.type);
		const registration = registrations.find((r) => r.id === type);
		if (!registration) {
			const known = registrations.map((r) => r.id).join(', ') || 'none';
			throw new ConfigurationError(`${field}.type`, `unknown target type "${type}" (known: ${known})`);
		}
		const config = def.config ?? {};
		if (!isRecord(config)) throw new ConfigurationError(`${field}.config`, 'expected a mapping');
		if (registration.configSchema) {
			const validate = ajv.compile(registration.configSchema);
			if (!validate(config)) {
				throw new ConfigurationError(`${field}.config`, describeSchemaErrors(validate.errors));
			}
		}
		try {
			return registration.create(config);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			throw new ConfigurationError(`${field}.config`, message, { cause: err });
		}
	});
}

/**
 * Engine options from a parsed config document.
 * Target types resolve through `registrations`; a target's config block is
 * checked against its registration's `configSchema` before it is created.
 */
export function optionsFromConfig(
	doc: unknown,
	registrations: readonly TargetRegistration[] = [],
): EngineOptions {
	if (doc === undefined || doc === null) return {};
	if (!isRecord(doc)) throw new ConfigurationError('(root)', 'expected a mapping');

	const options: EngineOptions = {};
	if (doc.level !== undefined) options.maxLevel = parseLevel('level', doc.level);
	if (doc.buffer_size !== undefined) options.bufferSize = parseCount('buffer_size', doc.buffer_size);
	if (doc.call_stack_depth !== undefined) {
		options.callStackDepth = parseCount('call_stack_depth', doc.call_stack_depth);
	}
	if (doc.call_stack_filter !== undefined) {
		options.callStackFilter = parseString('call_stack_filter', doc.call_stack_filter);
	}
	if (doc.sync !== undefined) options.syncMode = parseBoolean('sync', doc.sync);
	if (doc.fatal_action !== undefined) {
		options.fatalAction = parseFatalAction('fatal_action', doc.fatal_action);
	}
	if (doc.targets !== undefined) options.targets = buildTargets(doc.targets, registrations);
	return options;
}

/**
 * Read engine options from a YAML config file.
 */
export async function loadConfig(
	path: string,
	registrations: readonly TargetRegistration[] = [],
): Promise<EngineOptions> {
	const raw = await readFile(path, 'utf-8');
	let doc: unknown;
	try {
		doc = yaml.load(raw);
	} catch (err) {
		throw new ConfigurationError(path, 'invalid YAML', { cause: err });
	}
	return optionsFromConfig(doc, registrations);
}
