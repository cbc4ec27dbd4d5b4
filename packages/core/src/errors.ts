/**
 * Error types raised or reported by the dispatch engine.
 */

import type { Entry } from '@relaylog/sdk';

export class RelayLogError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'RelayLogError';
	}
}

/** Invalid engine options. Nothing changes state when this is raised. */
export class ConfigurationError extends RelayLogError {
	constructor(
		readonly field: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(`${field}: ${message}`, options);
		this.name = 'ConfigurationError';
	}
}

// ─── Target failures ──────────────────────────────────────────────────────────

export class TargetError extends RelayLogError {
	constructor(
		readonly targetId: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(`${message} "${targetId}"`, options);
		this.name = 'TargetError';
	}
}

export class TargetOpenError extends TargetError {
	constructor(targetId: string, options?: ErrorOptions) {
		super(targetId, 'failed to open target', options);
		this.name = 'TargetOpenError';
	}
}

export class TargetProcessError extends TargetError {
	constructor(targetId: string, options?: ErrorOptions) {
		super(targetId, 'failed to process entry in target', options);
		this.name = 'TargetProcessError';
	}
}

export class TargetCloseError extends TargetError {
	constructor(targetId: string, options?: ErrorOptions) {
		super(targetId, 'failed to close target', options);
		this.name = 'TargetCloseError';
	}
}

// ─── Fatal ────────────────────────────────────────────────────────────────────

/** Rejection of a fatal log call when the fatal action is `panic`. */
export class FatalError extends RelayLogError {
	constructor(readonly entry: Entry) {
		super(`Fatal error: ${entry.message}`);
		this.name = 'FatalError';
	}
}

/**
 * Render an error as the single diagnostic line written to an error writer:
 * `relaylog: <message>: <cause>`.
 */
export function describeError(error: Error): string {
	const cause = error.cause;
	if (cause === undefined) return `relaylog: ${error.message}\n`;
	const detail = cause instanceof Error ? cause.message : String(cause);
	return `relaylog: ${error.message}: ${detail}\n`;
}
