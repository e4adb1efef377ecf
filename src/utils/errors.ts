/**
 * Error taxonomy for a compression run.
 *
 * Setup errors abort the run before (or instead of) writing output.
 * Chunk errors are retried and, once exhausted, replaced by the original chunk text.
 */
export class AppError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class SetupError extends AppError {}

export class ConfigError extends SetupError {}

/**
 * Bad command-line arguments; the caller prints usage before exiting.
 */
export class UsageError extends ConfigError {}

export class InputError extends SetupError {}

export class OutputError extends SetupError {}

/**
 * Raised when the pipeline breaks its own bookkeeping (duplicate or missing result).
 */
export class PipelineError extends AppError {}

export class ChunkProcessingError extends AppError {
	public readonly index?: number;
	public readonly attempts?: number;

	constructor(message: string, options?: { cause?: unknown; index?: number; attempts?: number }) {
		super(message, { cause: options?.cause });
		this.index = options?.index;
		this.attempts = options?.attempts;
	}
}

export class HttpStatusError extends ChunkProcessingError {
	public readonly status: number;
	public readonly body: string;

	constructor(status: number, body: string) {
		super(`API returned error status ${status}: ${body}`);
		this.status = status;
		this.body = body;
	}
}

export class ResponseParseError extends ChunkProcessingError {}

export class SerializationError extends ChunkProcessingError {}

/**
 * Best-effort message extraction for values caught from `catch` clauses.
 */
export const errorMessage = (error: unknown): string => {
	if (error instanceof Error) return error.message;
	return String(error);
};

export const isSetupError = (error: unknown): error is SetupError => error instanceof SetupError;
