/**
 * Delivery tracking for asynchronously dispatched entries.
 *
 * Every queued entry takes a sequence mark on submit; the dispatcher
 * completes entries in the same order. waitFor(mark) resolves once every
 * entry up to and including that mark has been delivered.
 */

interface Waiter {
	mark: number;
	resolve: () => void;
}

export class DeliveryTracker {
	private submitted = 0;
	private completed = 0;
	private waiters: Waiter[] = [];

	/** Register one entry; returns its mark. */
	submit(): number {
		this.submitted++;
		return this.submitted;
	}

	/** Record one delivered entry. */
	complete(): void {
		if (this.completed >= this.submitted) {
			throw new Error('DeliveryTracker.complete() called with nothing pending');
		}
		this.completed++;
		const ready = this.waiters.filter((w) => w.mark <= this.completed);
		if (ready.length === 0) return;
		this.waiters = this.waiters.filter((w) => w.mark > this.completed);
		for (const waiter of ready) waiter.resolve();
	}

	/** Resolve once every entry submitted up to `mark` is delivered. */
	waitFor(mark: number): Promise<void> {
		if (this.completed >= mark) return Promise.resolve();
		return new Promise((resolve) => {
			this.waiters.push({ mark, resolve });
		});
	}

	/** Resolve once everything submitted so far is delivered. */
	drain(): Promise<void> {
		return this.waitFor(this.submitted);
	}

	/** Mark of the most recently submitted entry */
	get lastMark(): number {
		return this.submitted;
	}

	/** Entries submitted but not yet delivered */
	get pending(): number {
		return this.submitted - this.completed;
	}
}
