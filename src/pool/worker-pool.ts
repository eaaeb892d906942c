import { CancelledError } from "../errors";
import { BoundedQueue } from "./bounded-queue";

export type Job<R> = (signal: AbortSignal | undefined) => Promise<R>;

export type JobOutcome<R> =
	| { ok: true; value: R }
	| { ok: false; error: unknown };

/**
 * Handle for a job that has been accepted into a pool's queue. `result`
 * settles with the job's outcome and never rejects.
 */
export type Ticket<R> = {
	result: Promise<JobOutcome<R>>;
};

export type WorkerPoolOptions = {
	name: string;
	concurrency: number;
	/** Jobs waiting beyond this many block `submit`. */
	queueSize: number;
	signal?: AbortSignal;
};

type Entry = {
	execute: () => Promise<void>;
	cancel: (error: Error) => void;
};

/**
 * Fixed set of workers pulling from a bounded queue. Workers start eagerly
 * and run until `close` has been called and the queue is drained. Once the
 * signal aborts, queued jobs settle with a CancelledError instead of running.
 */
export class WorkerPool {
	readonly name: string;
	private readonly queue: BoundedQueue<Entry>;
	private readonly workers: Promise<void>[];
	private readonly signal: AbortSignal | undefined;
	private readonly onAbort = () => this.queue.close();
	private active = 0;

	constructor(options: WorkerPoolOptions) {
		if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
			throw new Error(
				`${options.name} pool concurrency must be a positive integer.`,
			);
		}
		this.name = options.name;
		this.signal = options.signal;
		this.queue = new BoundedQueue<Entry>(options.queueSize, options.name);
		this.signal?.addEventListener("abort", this.onAbort, { once: true });
		this.workers = Array.from({ length: options.concurrency }, () =>
			this.work(),
		);
	}

	/** Jobs queued or running. */
	get pending() {
		return this.queue.size + this.active;
	}

	/**
	 * Resolves once the job is queued, waiting for space when the queue is
	 * full. Rejects with CancelledError when the pool was cancelled or closed.
	 */
	async submit<R>(job: Job<R>): Promise<Ticket<R>> {
		if (this.signal?.aborted || this.queue.isClosed) {
			throw new CancelledError(`${this.name} pool is not accepting jobs.`);
		}
		let settle: (outcome: JobOutcome<R>) => void = () => {};
		const result = new Promise<JobOutcome<R>>((resolve) => {
			settle = resolve;
		});
		const entry: Entry = {
			execute: async () => {
				try {
					settle({ ok: true, value: await job(this.signal) });
				} catch (error) {
					settle({ ok: false, error });
				}
			},
			cancel: (error) => settle({ ok: false, error }),
		};
		try {
			await this.queue.push(entry);
		} catch {
			throw new CancelledError(`${this.name} pool is not accepting jobs.`);
		}
		return { result };
	}

	/**
	 * Stops accepting jobs and settles every job that has not started with a
	 * CancelledError. Running jobs finish normally.
	 */
	cancelQueued() {
		this.queue.close();
		for (const entry of this.queue.drain()) {
			entry.cancel(new CancelledError(`${this.name} job cancelled before it started.`));
		}
	}

	/**
	 * Stops accepting jobs and waits for queued and running jobs to settle.
	 */
	async close() {
		this.queue.close();
		await Promise.all(this.workers);
		this.signal?.removeEventListener("abort", this.onAbort);
	}

	private async work() {
		while (true) {
			const next = await this.queue.pull();
			if (!next) {
				return;
			}
			const entry = next.value;
			if (this.signal?.aborted) {
				entry.cancel(new CancelledError());
				continue;
			}
			this.active += 1;
			try {
				await entry.execute();
			} finally {
				this.active -= 1;
			}
		}
	}
}
