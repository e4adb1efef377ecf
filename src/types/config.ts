import type { EndpointMode } from './ai';

export interface IRunConfig {
    readonly input: string;
    readonly output: string;
    readonly model: string;
    readonly baseUrl: string;
    readonly mode: EndpointMode;
    readonly concurrency: number;
    readonly chunkSize: number;
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly retryDelayMs: number;
    readonly prompt: string;
}

/**
 * Shape of the `compress` section in config/config.yml.
 * Durations are milliseconds or strings understood by `ms` ("120s", "2s").
 */
export interface IFileConfig {
    compress?: {
        model?: string;
        url?: string;
        api?: string;
        concurrency?: number;
        chunk_size?: number;
        timeout?: number | string;
        retries?: number;
        retry_delay?: number | string;
        prompt?: string;
    };
}

export interface ICliOptions {
    input?: string;
    output?: string;
    model?: string;
    api?: string;
    url?: string;
    concurrency?: number;
    chunkSize?: number;
    config?: string;
    debug: boolean;
    help: boolean;
}
