import path from 'path';
import fs from 'fs/promises';

import Formatter from '../../utils/format';
import { OutputError, errorMessage } from '../../utils/errors';
import type { ChunkResult, IRunSummary } from '../../types';

export const CHUNK_SEPARATOR = Buffer.from('\n\n', 'utf8');

/**
 * Joins result contents in ascending index order. Works on bytes so that a
 * fallback chunk split inside a multi-byte character is written back intact.
 */
export const assemble = (results: ReadonlyArray<ChunkResult>): Buffer => {
	const ordered = [...results].sort((a, b) => a.index - b.index);
	const parts: Buffer[] = [];
	ordered.forEach((result, position) => {
		if (position > 0) parts.push(CHUNK_SEPARATOR);
		parts.push(result.content);
	});
	return Buffer.concat(parts);
};

/**
 * Writes `content` to `outputPath`, creating parent directories as needed.
 * @returns The size of the written file in bytes
 * @throws {OutputError} If the directory or file cannot be written
 */
export const writeOutput = async (outputPath: string, content: Buffer | string): Promise<number> => {
	try {
		await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
		await fs.writeFile(outputPath, content);
		const stats = await fs.stat(outputPath);
		return stats.size;
	} catch (error) {
		throw new OutputError(`Error writing to output file ${outputPath}: ${errorMessage(error)}`, { cause: error });
	}
};

export const summarize = (params: {
	output: string;
	totalChunks: number;
	failed: number;
	inputBytes: number;
	outputBytes: number;
}): IRunSummary => {
	const summary: IRunSummary = {
		output: params.output,
		totalChunks: params.totalChunks,
		succeeded: params.totalChunks - params.failed,
		failed: params.failed,
		inputBytes: params.inputBytes,
		outputBytes: params.outputBytes,
	};

	const ratio = Formatter.compressionRatio(params.inputBytes, params.outputBytes);
	if (ratio !== undefined) {
		summary.compressionRatio = ratio;
	}
	return summary;
};

export const formatSummary = (summary: IRunSummary): string[] => {
	const lines = [
		`Compression complete: ${summary.succeeded} of ${summary.totalChunks} chunks processed successfully (${summary.failed} errors)`,
		`Output saved to ${summary.output}`,
	];

	if (summary.compressionRatio !== undefined) {
		lines.push(
			`Compression ratio: ${summary.compressionRatio.toFixed(2)}x (from ${Formatter.toMegabytes(summary.inputBytes)} MB to ${Formatter.toMegabytes(summary.outputBytes)} MB)`
		);
	}
	return lines;
};
