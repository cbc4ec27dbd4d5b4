/**
 * DispatchEngine: the shared core behind every Logger.
 *
 * Owns the bounded entry queue, the dispatcher loop that fans entries out to
 * the targets, and the open/close lifecycle:
 *
 *   const engine = new DispatchEngine({ targets: [target] });
 *   await engine.open();
 *   ...
 *   await engine.close();
 */

import {
	type Entry,
	type ErrorWriter,
	type FatalAction,
	type Formatter,
	Level,
	type LoggerContext,
	type Target,
	buildEntry,
} from '@relaylog/sdk';
import { captureCallStack } from './callstack.js';
import {
	ConfigurationError,
	FatalError,
	RelayLogError,
	type TargetError,
	TargetCloseError,
	TargetOpenError,
	TargetProcessError,
	describeError,
} from './errors.js';
import { BoundedQueue } from './queue.js';
import { DeliveryTracker } from './tracker.js';

// ─── Engine Options ───────────────────────────────────────────────────────────

export const DEFAULT_BUFFER_SIZE = 1024;
/** Frames captured for fatal entries when call-stack capture is otherwise off */
export const FATAL_CALL_STACK_DEPTH = 20;
export const EXIT_MESSAGE = 'Forced to exit.';

export interface EngineOptions {
	/** Where diagnostics about targets go (default: process.stderr). Null fails open(). */
	errorWriter?: ErrorWriter | null;
	/** Queue capacity (default: 1024) */
	bufferSize?: number;
	/** Frames captured per entry; 0 disables capture (default: 0) */
	callStackDepth?: number;
	/** Substring a frame's file path must contain to be captured (default: '') */
	callStackFilter?: string;
	/** Most verbose level logged (default: Debug) */
	maxLevel?: Level;
	/** Targets, in delivery order */
	targets?: Target[];
	/** Deliver on the calling path instead of through the queue (default: false) */
	syncMode?: boolean;
	/** What a fatal entry does once delivered (default: 'nothing') */
	fatalAction?: FatalAction;
	/** Process exit used by the `exit` fatal action (default: process.exit) */
	exit?: (code: number) => void;
}

/** Where an entry comes from: the logger facade that produced it. */
export interface EntryOrigin {
	logger: LoggerContext;
	formatter: Formatter;
}

type QueueItem = { kind: 'entry'; entry: Entry } | { kind: 'shutdown' };

/** State that exists only between open() and close(). */
interface OpenCycle {
	queue: BoundedQueue<QueueItem>;
	targets: readonly Target[];
	errorWriter: ErrorWriter;
	dispatcher: Promise<void>;
}

// ─── DispatchEngine Class ─────────────────────────────────────────────────────

export class DispatchEngine {
	// Read by open()
	errorWriter: ErrorWriter | null;
	bufferSize: number;
	targets: Target[];

	// Read on every log call
	callStackDepth: number;
	callStackFilter: string;
	maxLevel: Level;
	syncMode: boolean;
	fatalAction: FatalAction;

	private readonly exit: (code: number) => void;
	private readonly tracker = new DeliveryTracker();
	private cycle: OpenCycle | null = null;
	private transition: Promise<void> = Promise.resolve();

	constructor(options: EngineOptions = {}) {
		this.errorWriter = options.errorWriter === undefined ? process.stderr : options.errorWriter;
		this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
		this.targets = [...(options.targets ?? [])];
		this.callStackDepth = options.callStackDepth ?? 0;
		this.callStackFilter = options.callStackFilter ?? '';
		this.maxLevel = options.maxLevel ?? Level.Debug;
		this.syncMode = options.syncMode ?? false;
		this.fatalAction = options.fatalAction ?? 'nothing';
		this.exit = options.exit ?? ((code) => process.exit(code));
	}

	get isOpen(): boolean {
		return this.cycle !== null;
	}

	/** Targets that opened successfully in the current cycle */
	get activeTargets(): readonly Target[] {
		return this.cycle?.targets ?? [];
	}

	/** Queued entries not yet delivered */
	get pending(): number {
		return this.tracker.pending;
	}

	// ─── Lifecycle ────────────────────────────────────────────────────────────

	/**
	 * Open the engine: validate options, open targets, start the dispatcher.
	 * No-op when already open.
	 */
	open(): Promise<void> {
		if (this.cycle) return Promise.resolve();
		return this.serialize(() => this.openCycle());
	}

	/**
	 * Close the engine. New entries are rejected immediately; entries queued
	 * before this call are delivered, then every active target is closed.
	 * No-op when already closed.
	 */
	close(): Promise<void> {
		const detached = this.detach();
		return this.serialize(async () => {
			if (detached) await this.closeCycle(detached);
			// A transition queued ahead of this one may have opened a fresh cycle
			const reopened = this.detach();
			if (reopened) await this.closeCycle(reopened);
		});
	}

	/** Resolve once every entry queued so far has been delivered. */
	flush(): Promise<void> {
		return this.tracker.drain();
	}

	/**
	 * Replace the targets. The engine is closed (draining and closing the
	 * current targets) and reopened with the new list; with no targets it
	 * stays closed.
	 */
	async setTargets(...targets: Target[]): Promise<void> {
		await this.close();
		await this.serialize(async () => {
			this.targets = [...targets];
		});
		if (targets.length > 0) await this.open();
	}

	/** Append targets, closing and reopening the engine around the change. */
	async addTargets(...targets: Target[]): Promise<void> {
		await this.close();
		await this.serialize(async () => {
			this.targets.push(...targets);
		});
		await this.open();
	}

	// ─── Logging ──────────────────────────────────────────────────────────────

	/**
	 * Log one message. Entries above maxLevel, or logged while the engine is
	 * closed, are dropped silently.
	 *
	 * The returned promise resolves once the entry is queued (async mode) or
	 * delivered (sync mode). Fatal entries resolve after the fatal action.
	 */
	enqueue(level: Level, message: string, origin: EntryOrigin): Promise<void> {
		const cycle = this.cycle;
		if (level > this.maxLevel || !cycle) return Promise.resolve();

		let depth = this.callStackDepth;
		if (level === Level.Fatal && depth === 0) depth = FATAL_CALL_STACK_DEPTH;
		// Skip enqueue, the logger's emit and the public logging method
		const callStack = depth > 0 ? captureCallStack(3, depth, this.callStackFilter) : '';
		const entry = buildEntry(
			{ level, category: origin.logger.category, message, callStack },
			origin.logger,
			origin.formatter,
		);

		if (level === Level.Fatal) return this.fatal(entry, cycle, origin);
		if (this.syncMode) return this.deliver(entry, cycle);

		this.tracker.submit();
		return cycle.queue.push({ kind: 'entry', entry });
	}

	// ─── Internal: Fatal ──────────────────────────────────────────────────────

	private async fatal(entry: Entry, cycle: OpenCycle, origin: EntryOrigin): Promise<void> {
		const mark = this.tracker.lastMark;
		await this.deliver(entry, cycle);
		await this.tracker.waitFor(mark);

		switch (this.fatalAction) {
			case 'panic':
				throw new FatalError(entry);
			case 'exit': {
				const notice = buildEntry(
					{ level: Level.Warn, category: origin.logger.category, message: EXIT_MESSAGE },
					origin.logger,
					origin.formatter,
				);
				await this.deliver(notice, cycle);
				this.exit(1);
				return;
			}
			case 'nothing':
				return;
		}
	}

	// ─── Internal: Dispatch ───────────────────────────────────────────────────

	private async dispatch(cycle: Omit<OpenCycle, 'dispatcher'>): Promise<void> {
		for (;;) {
			const item = await cycle.queue.pop();
			if (item.kind === 'shutdown') return;
			await this.deliver(item.entry, cycle);
			this.tracker.complete();
		}
	}

	/**
	 * Hand an entry to every target in order. Targets that finish synchronously
	 * are called synchronously, so sync-mode delivery completes before the
	 * logging call returns.
	 */
	private deliver(entry: Entry, cycle: Omit<OpenCycle, 'dispatcher'>, from = 0): Promise<void> {
		for (let i = from; i < cycle.targets.length; i++) {
			const pending = this.invoke(cycle.targets[i], entry, cycle.errorWriter);
			if (pending) return pending.then(() => this.deliver(entry, cycle, i + 1));
		}
		return Promise.resolve();
	}

	private invoke(target: Target, entry: Entry, errorWriter: ErrorWriter): Promise<void> | null {
		try {
			const result = target.process(entry);
			if (result instanceof Promise) {
				return result.catch((err: unknown) => {
					report(errorWriter, new TargetProcessError(target.id, { cause: err }));
				});
			}
		} catch (err) {
			report(errorWriter, new TargetProcessError(target.id, { cause: err }));
		}
		return null;
	}

	// ─── Internal: Open / close ───────────────────────────────────────────────

	private async openCycle(): Promise<void> {
		if (this.cycle) return;

		const errorWriter = this.errorWriter;
		if (!errorWriter) {
			throw new ConfigurationError('errorWriter', 'must be set');
		}
		if (!Number.isInteger(this.bufferSize) || this.bufferSize < 0) {
			throw new ConfigurationError('bufferSize', 'must be an integer no less than 0');
		}
		if (!Number.isInteger(this.callStackDepth) || this.callStackDepth < 0) {
			throw new ConfigurationError('callStackDepth', 'must be an integer no less than 0');
		}

		const active: Target[] = [];
		for (const target of this.targets) {
			try {
				await target.open(errorWriter);
				active.push(target);
			} catch (err) {
				report(errorWriter, new TargetOpenError(target.id, { cause: err }));
			}
		}

		const parts = { queue: new BoundedQueue<QueueItem>(this.bufferSize), targets: active, errorWriter };
		this.cycle = { ...parts, dispatcher: this.dispatch(parts) };
	}

	private async closeCycle(cycle: OpenCycle): Promise<void> {
		await cycle.queue.push({ kind: 'shutdown' });
		await cycle.dispatcher;
		for (const target of cycle.targets) {
			try {
				await target.close();
			} catch (err) {
				report(cycle.errorWriter, new TargetCloseError(target.id, { cause: err }));
			}
		}
	}

	private detach(): OpenCycle | null {
		const cycle = this.cycle;
		this.cycle = null;
		return cycle;
	}

	/** Run lifecycle transitions one at a time, in call order. */
	private serialize(step: () => Promise<void>): Promise<void> {
		const run = this.transition.then(step);
		// Failures reach the caller through `run`; the chain itself keeps going
		this.transition = run.catch(() => undefined);
		return run;
	}
}

function report(errorWriter: ErrorWriter, error: TargetError): void {
	try {
		errorWriter.write(describeError(error));
	} catch (err) {
		// The dispatcher must outlive a broken error writer
		process.stderr.write(describeError(error));
		process.stderr.write(describeError(new RelayLogError('error writer failed', { cause: err })));
	}
}
