/**
 * Target interface: pluggable destinations for log entries.
 *
 * The dispatch engine opens every target when it opens, hands each entry to
 * every open target in registration order, and closes them once the queue
 * has drained.
 */

import type { Entry, ErrorWriter } from './types.js';

/**
 * Target interface.
 *
 * Implement this to create a new log destination.
 * Targets are called for every delivered entry: they should be fast.
 */
export interface Target {
	/** Target ID used in diagnostics */
	readonly id: string;

	/**
	 * Prepare for processing. Called once per open cycle.
	 * Throwing (or rejecting) leaves the target out of that cycle.
	 * `errorWriter` is where the target should report its own failures.
	 */
	open(errorWriter: ErrorWriter): void | Promise<void>;

	/**
	 * Called for every delivered entry.
	 * Should not throw or block indefinitely: the engine reports a throw
	 * on the error writer and moves on to the next target.
	 */
	process(entry: Entry): void | Promise<void>;

	/** Flush and release resources. Called once per close cycle, after the queue drains. */
	close(): void | Promise<void>;
}

/**
 * Target registration: what a target package exports.
 */
export interface TargetRegistration {
	/** Target type, as referenced from configuration files */
	id: string;
	/** Build a target from its configuration block */
	create(config: Record<string, unknown>): Target;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}
