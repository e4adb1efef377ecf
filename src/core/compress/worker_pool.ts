import { PipelineError } from '../../utils/errors';

/**
 * Counting admission gate: at most `capacity` holders at any instant.
 * Waiters are admitted in FIFO order.
 */
export class Semaphore {
	private readonly waiters: Array<() => void> = [];
	private available: number;
	private active = 0;
	private peak = 0;

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Concurrency limit must be an integer >= 1, got ${capacity}`);
		}
		this.available = capacity;
	}

	public get activeCount(): number {
		return this.active;
	}

	public get peakActive(): number {
		return this.peak;
	}

	private admit(): void {
		this.active++;
		this.peak = Math.max(this.peak, this.active);
	}

	public acquire(): Promise<void> {
		if (this.available > 0) {
			this.available--;
			this.admit();
			return Promise.resolve();
		}

		return new Promise<void>((resolve) => {
			this.waiters.push(() => {
				this.admit();
				resolve();
			});
		});
	}

	/**
	 * Returns a slot. A waiting acquirer, if any, takes it over directly.
	 */
	public release(): void {
		if (this.active === 0) {
			throw new PipelineError('Semaphore released more times than acquired');
		}
		this.active--;

		const next = this.waiters.shift();
		if (next) {
			next();
		} else {
			this.available++;
		}
	}

	/**
	 * Runs `fn` while holding a slot; the slot is released however `fn` ends.
	 */
	public async use<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}

/**
 * Runs `worker` for every item with at most `limit` calls in flight. Passing a
 * `Semaphore` instead of a number lets the caller observe its counters.
 *
 * A slot is acquired before each item's worker starts, so a lazy source is
 * only read as fast as slots free up. Results are handed to `onResult` as they
 * complete (completion order), and the returned promise settles once every
 * started worker has settled. If the source fails, in-flight workers are still
 * awaited before the source error is rethrown.
 *
 * @throws {PipelineError} If any worker or `onResult` call threw
 */
export const runPool = async <T, R>(
	items: Iterable<T> | AsyncIterable<T>,
	limit: number | Semaphore,
	worker: (item: T) => Promise<R>,
	onResult?: (result: R) => void
): Promise<R[]> => {
	const gate = typeof limit === 'number' ? new Semaphore(limit) : limit;
	const results: R[] = [];
	const taskErrors: unknown[] = [];
	const pending = new Set<Promise<void>>();

	const runTask = async (item: T): Promise<void> => {
		try {
			const result = await worker(item);
			results.push(result);
			onResult?.(result);
		} catch (error) {
			taskErrors.push(error);
		} finally {
			gate.release();
		}
	};

	let sourceFailed = false;
	let sourceError: unknown;

	try {
		for await (const item of items) {
			await gate.acquire();
			const task: Promise<void> = runTask(item).finally(() => pending.delete(task));
			pending.add(task);
		}
	} catch (error) {
		sourceFailed = true;
		sourceError = error;
	}

	await Promise.all(pending);

	if (sourceFailed) {
		throw sourceError;
	}
	if (taskErrors.length > 0) {
		throw new PipelineError(`${taskErrors.length} pool task(s) failed`, { cause: taskErrors[0] });
	}
	return results;
};
