import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { OutputError } from '../../utils/errors';
import { assemble, formatSummary, summarize, writeOutput } from './assembler';

describe('assemble', () => {
	it('joins contents by ascending index with a blank line', () => {
		const assembled = assemble([
			{ index: 1, content: Buffer.from('B'), attempts: 1 },
			{ index: 2, content: Buffer.from('C'), attempts: 1 },
			{ index: 0, content: Buffer.from('A'), attempts: 1 },
		]);

		expect(assembled.toString('utf8')).toBe('A\n\nB\n\nC');
	});

	it('returns an empty buffer for no results', () => {
		expect(assemble([]).length).toBe(0);
	});

	it('keeps the bytes of a character split between two chunks', () => {
		const assembled = assemble([
			{ index: 0, content: Buffer.from([0x61, 0x62, 0x63, 0xc3]), attempts: 3, error: new Error('down') },
			{ index: 1, content: Buffer.from([0xa9]), attempts: 3, error: new Error('down') },
		]);

		expect(assembled.toString('hex')).toBe('616263c30a0aa9');
	});
});

describe('writeOutput', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'squeeze-assembler-'));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it('creates parent directories and returns the written size', async () => {
		const output = path.join(dir, 'nested', 'deeper', 'out.txt');

		const size = await writeOutput(output, 'héllo');

		expect(size).toBe(6);
		expect(await fs.readFile(output, 'utf8')).toBe('héllo');
	});

	it('writes buffers byte for byte', async () => {
		const output = path.join(dir, 'raw.bin');

		const size = await writeOutput(output, Buffer.from([0x61, 0xc3, 0x0a, 0x0a, 0xa9]));

		expect(size).toBe(5);
		expect((await fs.readFile(output)).toString('hex')).toBe('61c30a0aa9');
	});

	it('wraps write failures in an OutputError', async () => {
		const blocker = path.join(dir, 'file');
		await fs.writeFile(blocker, 'not a directory');

		await expect(writeOutput(path.join(blocker, 'out.txt'), 'x')).rejects.toBeInstanceOf(OutputError);
	});
});

describe('summarize', () => {
	it('reports the ratio of input to output bytes', () => {
		const summary = summarize({ output: 'llm.txt', totalChunks: 4, failed: 1, inputBytes: 3 * 1024 * 1024, outputBytes: 1024 * 1024 });

		expect(summary).toEqual({
			output: 'llm.txt',
			totalChunks: 4,
			succeeded: 3,
			failed: 1,
			inputBytes: 3 * 1024 * 1024,
			outputBytes: 1024 * 1024,
			compressionRatio: 3,
		});
		expect(formatSummary(summary)).toEqual([
			'Compression complete: 3 of 4 chunks processed successfully (1 errors)',
			'Output saved to llm.txt',
			'Compression ratio: 3.00x (from 3.00 MB to 1.00 MB)',
		]);
	});

	it('leaves the ratio undefined when the output is empty', () => {
		const summary = summarize({ output: 'empty.txt', totalChunks: 0, failed: 0, inputBytes: 0, outputBytes: 0 });

		expect(summary.compressionRatio).toBeUndefined();
		expect(formatSummary(summary)).toEqual([
			'Compression complete: 0 of 0 chunks processed successfully (0 errors)',
			'Output saved to empty.txt',
		]);
	});
});
