import fs from 'fs';

import { InputError, errorMessage } from '../../utils/errors';
import type { Chunk } from '../../types';

const assertChunkSize = (size: number): void => {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
	}
};

/**
 * Number of chunks a source of `totalBytes` splits into.
 */
export const countChunks = (totalBytes: number, size: number): number => {
	assertChunkSize(size);
	return Math.ceil(totalBytes / size);
};

/**
 * Re-slices an arbitrary byte source into chunks of exactly `size` bytes,
 * the last one possibly shorter. Splitting is byte-oriented and may cut a
 * multi-byte character in two.
 */
export async function* readChunks(source: AsyncIterable<Buffer | string>, size: number): AsyncGenerator<Chunk> {
	assertChunkSize(size);

	let index = 0;
	let pending: Buffer = Buffer.alloc(0);

	for await (const piece of source) {
		const bytes = typeof piece === 'string' ? Buffer.from(piece, 'utf8') : piece;
		pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes]);

		while (pending.length >= size) {
			yield { index: index++, content: Buffer.from(pending.subarray(0, size)) };
			pending = pending.subarray(size);
		}
	}

	if (pending.length > 0) {
		yield { index: index++, content: Buffer.from(pending) };
	}
}

/**
 * Lazily chunks a file from disk.
 * @throws {InputError} If the file cannot be opened or a read fails
 */
export async function* chunkFile(filePath: string, size: number): AsyncGenerator<Chunk> {
	assertChunkSize(size);

	const stream = fs.createReadStream(filePath, { highWaterMark: Math.max(size, 64 * 1024) });
	try {
		yield* readChunks(stream, size);
	} catch (error) {
		throw new InputError(`Error reading chunk from ${filePath}: ${errorMessage(error)}`, { cause: error });
	} finally {
		stream.destroy();
	}
}
