export class QueueClosedError extends Error {
	constructor(name: string) {
		super(`Queue ${name} is closed.`);
		this.name = "QueueClosedError";
	}
}

/**
 * FIFO with a fixed capacity. `push` waits while the queue is full, which is
 * what throttles producers; `pull` waits while it is empty and yields
 * `undefined` once the queue is closed and drained.
 */
export class BoundedQueue<T> {
	private readonly items: Array<{ value: T }> = [];
	private readonly spaceWaiters: Array<() => void> = [];
	private readonly itemWaiters: Array<(entry: { value: T } | undefined) => void> =
		[];
	private closed = false;

	constructor(
		readonly capacity: number,
		private readonly name = "queue",
	) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`Queue capacity must be a positive integer (got ${capacity}).`);
		}
	}

	get size() {
		return this.items.length;
	}

	get isClosed() {
		return this.closed;
	}

	async push(value: T) {
		while (!this.closed && this.items.length >= this.capacity) {
			await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
		}
		if (this.closed) {
			throw new QueueClosedError(this.name);
		}
		const waiter = this.itemWaiters.shift();
		if (waiter) {
			waiter({ value });
			return;
		}
		this.items.push({ value });
	}

	async pull(): Promise<{ value: T } | undefined> {
		const entry = this.items.shift();
		if (entry) {
			this.spaceWaiters.shift()?.();
			return entry;
		}
		if (this.closed) {
			return undefined;
		}
		return new Promise((resolve) => this.itemWaiters.push(resolve));
	}

	/** Removes and returns everything still queued. */
	drain() {
		return this.items.splice(0).map((item) => item.value);
	}

	/**
	 * Rejects further pushes. Items already queued can still be pulled.
	 */
	close() {
		if (this.closed) return;
		this.closed = true;
		for (const waiter of this.itemWaiters.splice(0)) {
			waiter(undefined);
		}
		for (const waiter of this.spaceWaiters.splice(0)) {
			waiter();
		}
	}
}
