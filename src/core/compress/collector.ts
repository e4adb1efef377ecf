import { PipelineError } from '../../utils/errors';
import type { ChunkResult } from '../../types';

/**
 * Single consumer of worker results. Holds the only shared state of a run:
 * results by index and the failure count.
 */
export class ResultCollector {
	private readonly results = new Map<number, ChunkResult>();
	private failures = 0;

	public add(result: ChunkResult): void {
		if (!Number.isInteger(result.index) || result.index < 0) {
			throw new PipelineError(`Invalid chunk index ${result.index}`);
		}
		if (this.results.has(result.index)) {
			throw new PipelineError(`Duplicate result for chunk ${result.index}`);
		}

		this.results.set(result.index, result);
		if (result.error) this.failures++;
	}

	public get size(): number {
		return this.results.size;
	}

	public get failed(): number {
		return this.failures;
	}

	public get succeeded(): number {
		return this.results.size - this.failures;
	}

	/**
	 * Results in index order.
	 * @throws {PipelineError} Unless the indices are exactly 0..total-1
	 */
	public ordered(total: number): ChunkResult[] {
		if (this.results.size !== total) {
			throw new PipelineError(`Expected ${total} results, collected ${this.results.size}`);
		}

		const ordered: ChunkResult[] = [];
		for (let index = 0; index < total; index++) {
			const result = this.results.get(index);
			if (!result) {
				throw new PipelineError(`Missing result for chunk ${index}`);
			}
			ordered.push(result);
		}
		return ordered;
	}
}
