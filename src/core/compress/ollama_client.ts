import axios from 'axios';
import { Readable, addAbortSignal } from 'stream';
import type { AxiosInstance } from 'axios';

import { wait } from '../../utils/extras';
import Formatter from '../../utils/format';
import { buildRequest, endpointUrl } from './request_builder';
import { parseChatResponse, parseGenerateStream, readBody, toByteSource } from './response_parser';
import { ChunkProcessingError, HttpStatusError, errorMessage } from '../../utils/errors';
import type { Chunk, ChunkResult, EndpointMode, ILogger, IRunConfig } from '../../types';

export type OllamaClientConfig = Pick<IRunConfig, 'baseUrl' | 'model' | 'mode' | 'timeoutMs' | 'maxRetries' | 'retryDelayMs' | 'prompt'>;

/**
 * Client for the generate and chat endpoints of an Ollama-compatible service.
 * Each chunk is retried with a fixed delay; a chunk that keeps failing
 * resolves to its original bytes instead of rejecting.
 */
class OllamaClient {
	private readonly http: AxiosInstance;
	private readonly logger: ILogger;
	private readonly url: string;
	private readonly model: string;
	private readonly mode: EndpointMode;
	private readonly prompt: string;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;

	/**
	 * @param config - Endpoint, model and retry settings for the run.
	 * @param logger - Receives per-attempt warnings.
	 * @param http - Shared axios instance; safe to reuse across concurrent calls.
	 */
	constructor(config: OllamaClientConfig, logger: ILogger, http: AxiosInstance = axios.create()) {
		this.http = http;
		this.logger = logger;
		this.url = endpointUrl(config.baseUrl, config.mode);
		this.model = config.model;
		this.mode = config.mode;
		this.prompt = config.prompt;
		this.timeoutMs = config.timeoutMs;
		this.maxRetries = config.maxRetries;
		this.retryDelayMs = config.retryDelayMs;
	}

	public getUrl(): string {
		return this.url;
	}

	/**
	 * Performs a single request for `text` and returns the generated text.
	 * The whole attempt, body included, is bounded by `timeoutMs`.
	 * @throws {ChunkProcessingError} On non-200 status, unparsable body, serialization failure or timeout
	 * @throws {AxiosError} On network failure
	 */
	public async compress(text: string): Promise<string> {
		const body = buildRequest(this.mode, this.model, text, this.prompt);
		const signal = AbortSignal.timeout(this.timeoutMs);

		try {
			const response = await this.http.post<unknown>(this.url, body, {
				timeout: this.timeoutMs,
				signal,
				headers: { 'Content-Type': 'application/json' },
				responseType: this.mode === 'generate' ? 'stream' : 'text',
				transformResponse: (data: unknown) => data,
				validateStatus: () => true,
			});

			// axios stops watching the signal once headers arrive; the body must still honour it
			const data: unknown = response.data instanceof Readable ? addAbortSignal(signal, response.data) : response.data;

			if (response.status !== 200) {
				throw new HttpStatusError(response.status, await readBody(data));
			}

			switch (this.mode) {
				case 'generate':
					return await parseGenerateStream(toByteSource(data));
				case 'chat':
					return parseChatResponse(await readBody(data));
			}
		} catch (error) {
			if (signal.aborted) {
				throw new ChunkProcessingError(`Request timed out after ${this.timeoutMs}ms`, { cause: error });
			}
			throw error;
		}
	}

	/**
	 * Compresses one chunk, retrying up to `maxRetries` attempts with a fixed
	 * delay between them. Never rejects for per-chunk failures.
	 */
	public async compressChunk(chunk: Chunk): Promise<ChunkResult> {
		const text = chunk.content.toString('utf8');
		let lastError: unknown;

		for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
			if (attempt > 1) {
				await wait(this.retryDelayMs);
			}

			try {
				const content = await this.compress(text);
				return { index: chunk.index, content: Buffer.from(content, 'utf8'), attempts: attempt };
			} catch (error) {
				lastError = error;
				this.logger.warn(`[OLLAMA] Attempt ${attempt}: Error processing chunk ${chunk.index}: ${Formatter.truncate(errorMessage(error), 300)}`);
			}
		}

		const error = new ChunkProcessingError(
			`All ${this.maxRetries} attempts failed for chunk ${chunk.index}: ${errorMessage(lastError)}`,
			{ cause: lastError, index: chunk.index, attempts: this.maxRetries }
		);
		this.logger.error(`[OLLAMA] ${Formatter.truncate(error.message, 300)}`);

		return { index: chunk.index, content: chunk.content, attempts: this.maxRetries, error };
	}
}

export default OllamaClient;
