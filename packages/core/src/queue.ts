/**
 * Bounded FIFO queue with promise-based backpressure.
 *
 * push() resolves once the item is buffered or handed to a waiting consumer;
 * when the buffer is full it stays pending until a pop() makes room.
 * A capacity of 0 makes every push a rendezvous with a pop.
 */

interface BlockedPush<T> {
	item: T;
	resolve: () => void;
}

export class BoundedQueue<T> {
	readonly capacity: number;
	private readonly buffer: T[] = [];
	private readonly blocked: BlockedPush<T>[] = [];
	private readonly consumers: Array<(item: T) => void> = [];

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 0) {
			throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	push(item: T): Promise<void> {
		const consumer = this.consumers.shift();
		if (consumer) {
			consumer(item);
			return Promise.resolve();
		}
		if (this.buffer.length < this.capacity) {
			this.buffer.push(item);
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.blocked.push({ item, resolve });
		});
	}

	pop(): Promise<T> {
		if (this.buffer.length > 0) {
			const [item] = this.buffer.splice(0, 1);
			this.admitBlocked();
			return Promise.resolve(item);
		}
		const next = this.blocked.shift();
		if (next) {
			next.resolve();
			return Promise.resolve(next.item);
		}
		return new Promise((resolve) => {
			this.consumers.push(resolve);
		});
	}

	/** Buffered items plus pushes still waiting for room */
	get length(): number {
		return this.buffer.length + this.blocked.length;
	}

	/** Pops currently waiting for an item */
	get waiting(): number {
		return this.consumers.length;
	}

	private admitBlocked(): void {
		const next = this.blocked.shift();
		if (!next) return;
		this.buffer.push(next.item);
		next.resolve();
	}
}
