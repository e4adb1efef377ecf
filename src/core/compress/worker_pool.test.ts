import { describe, expect, it } from 'vitest';

import { wait } from '../../utils/extras';
import { PipelineError } from '../../utils/errors';
import { Semaphore, runPool } from './worker_pool';

describe('Semaphore', () => {
	it('admits up to capacity and queues the rest in order', async () => {
		const gate = new Semaphore(2);
		const admitted: string[] = [];

		await gate.acquire();
		await gate.acquire();
		const third = gate.acquire().then(() => admitted.push('third'));
		const fourth = gate.acquire().then(() => admitted.push('fourth'));

		await wait(5);
		expect(admitted).toEqual([]);
		expect(gate.activeCount).toBe(2);

		gate.release();
		await third;
		expect(admitted).toEqual(['third']);

		gate.release();
		await fourth;
		expect(admitted).toEqual(['third', 'fourth']);
		expect(gate.peakActive).toBe(2);
	});

	it('releases the slot when the guarded function throws', async () => {
		const gate = new Semaphore(1);

		await expect(gate.use(async () => {
			throw new Error('boom');
		})).rejects.toThrow('boom');

		expect(gate.activeCount).toBe(0);
		await expect(gate.use(async () => 'next')).resolves.toBe('next');
	});

	it('rejects releasing an idle semaphore', () => {
		expect(() => new Semaphore(1).release()).toThrow(PipelineError);
	});

	it('rejects a capacity below one', () => {
		expect(() => new Semaphore(0)).toThrow(RangeError);
		expect(() => new Semaphore(1.5)).toThrow(RangeError);
	});
});

describe('runPool', () => {
	it('produces exactly one result per item', async () => {
		const items = Array.from({ length: 25 }, (_, index) => index);

		const results = await runPool(items, 4, async (item) => {
			await wait((item * 7) % 5);
			return item;
		});

		expect(results).toHaveLength(25);
		expect([...results].sort((a, b) => a - b)).toEqual(items);
	});

	it('never runs more than the limit at once', async () => {
		const gate = new Semaphore(3);
		let active = 0;
		let peak = 0;

		await runPool(Array.from({ length: 12 }, (_, index) => index), gate, async () => {
			active++;
			peak = Math.max(peak, active);
			await wait(5);
			active--;
		});

		expect(peak).toBe(3);
		expect(gate.peakActive).toBe(3);
		expect(gate.activeCount).toBe(0);
	});

	it('runs items one at a time with a limit of one', async () => {
		const order: string[] = [];

		await runPool(['a', 'b', 'c'], 1, async (item) => {
			order.push(`start ${item}`);
			await wait(1);
			order.push(`end ${item}`);
		});

		expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
	});

	it('delivers results to the consumer in completion order', async () => {
		const delivered: number[] = [];

		await runPool([30, 1, 15], 3, async (delay) => {
			await wait(delay);
			return delay;
		}, (result) => delivered.push(result));

		expect(delivered).toEqual([1, 15, 30]);
	});

	it('reads a lazy source only as slots free up', async () => {
		let read = 0;
		let maxAhead = 0;
		let finished = 0;

		async function* source(): AsyncGenerator<number> {
			for (let index = 0; index < 10; index++) {
				read++;
				maxAhead = Math.max(maxAhead, read - finished);
				yield index;
			}
		}

		await runPool(source(), 2, async () => {
			await wait(2);
			finished++;
		});

		expect(read).toBe(10);
		expect(maxAhead).toBeLessThanOrEqual(3);
	});

	it('awaits in-flight work before rethrowing a source failure', async () => {
		let completed = 0;

		async function* source(): AsyncGenerator<number> {
			yield 1;
			yield 2;
			throw new Error('read failed');
		}

		await expect(runPool(source(), 2, async () => {
			await wait(10);
			completed++;
		})).rejects.toThrow('read failed');
		expect(completed).toBe(2);
	});

	it('reports worker failures after every other item has finished', async () => {
		let completed = 0;

		const pool = runPool([1, 2, 3, 4], 2, async (item) => {
			if (item === 2) throw new Error('worker failed');
			await wait(5);
			completed++;
		});

		await expect(pool).rejects.toBeInstanceOf(PipelineError);
		expect(completed).toBe(3);
	});

	it('handles an empty source', async () => {
		expect(await runPool([], 3, async () => 1)).toEqual([]);
	});
});
