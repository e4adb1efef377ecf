import fs from 'fs/promises';
import type { AxiosInstance } from 'axios';

import Formatter from '../../utils/format';
import OllamaClient from './ollama_client';
import { runPool } from './worker_pool';
import { ResultCollector } from './collector';
import { chunkFile, countChunks } from './chunker';
import { InputError, errorMessage } from '../../utils/errors';
import { assemble, formatSummary, summarize, writeOutput } from './assembler';
import type { Chunk, ILogger, IRunConfig, IRunSummary } from '../../types';

/**
 * Runs one compression batch: chunk the input, compress every chunk through
 * the bounded pool, reassemble in order and write the output file.
 *
 * @example
 * ```typescript
 * const summary = await new Compressor(config, logger).run();
 * ```
 */
export class Compressor {
	private readonly config: IRunConfig;
	private readonly logger: ILogger;
	private readonly client: OllamaClient;

	constructor(config: IRunConfig, logger: ILogger, http?: AxiosInstance) {
		this.config = config;
		this.logger = logger;
		this.client = new OllamaClient(config, logger, http);
	}

	private async statInput(): Promise<number> {
		try {
			const stats = await fs.stat(this.config.input);
			if (!stats.isFile()) {
				throw new InputError(`Input is not a regular file: ${this.config.input}`);
			}
			return stats.size;
		} catch (error) {
			if (error instanceof InputError) throw error;
			throw new InputError(`Error getting file info: ${errorMessage(error)}`, { cause: error });
		}
	}

	/**
	 * @throws {SetupError} If the input cannot be read or the output cannot be written
	 */
	public async run(): Promise<IRunSummary> {
		const { input, output, chunkSize, concurrency } = this.config;

		const inputBytes = await this.statInput();
		const expectedChunks = countChunks(inputBytes, chunkSize);

		this.logger.info(`[SQUEEZE] Processing file: ${input} (${Formatter.toMegabytes(inputBytes)} MB)`);
		this.logger.info(`[SQUEEZE] Using model: ${this.config.model}`);
		this.logger.info(`[SQUEEZE] Using API endpoint: ${this.client.getUrl()}`);
		this.logger.info(`[SQUEEZE] Splitting file into ${expectedChunks} chunks`);

		let produced = 0;
		const chunks = async function* (): AsyncGenerator<Chunk> {
			for await (const chunk of chunkFile(input, chunkSize)) {
				produced++;
				yield chunk;
			}
		};

		const collector = new ResultCollector();
		await runPool(
			chunks(),
			concurrency,
			(chunk) => this.client.compressChunk(chunk),
			(result) => {
				collector.add(result);
				this.logger.debug(`[SQUEEZE] Processed ${collector.size}/${expectedChunks} chunks`);
			}
		);

		const assembled = assemble(collector.ordered(produced));
		const outputBytes = await writeOutput(output, assembled);

		const summary = summarize({
			output,
			totalChunks: produced,
			failed: collector.failed,
			inputBytes,
			outputBytes,
		});

		const [headline, ...details] = formatSummary(summary);
		if (summary.failed > 0) {
			this.logger.warn(`[SQUEEZE] ${headline}`);
		} else {
			this.logger.success(`[SQUEEZE] ${headline}`);
		}
		details.forEach((line) => this.logger.info(`[SQUEEZE] ${line}`));

		return summary;
	}
}
