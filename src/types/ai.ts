export const ENDPOINT_MODES = ['generate', 'chat'] as const;

export type EndpointMode = (typeof ENDPOINT_MODES)[number];

export interface Chunk {
	readonly index: number;
	readonly content: Buffer;
}

/**
 * Outcome for one chunk. `content` holds the service's text on success and
 * the chunk's original bytes, untouched, when every attempt failed.
 */
export interface ChunkResult {
	index: number;
	content: Buffer;
	attempts: number;
	error?: Error;
}

export interface IChatMessage {
	role: 'system' | 'user' | 'assistant';
	content: string;
}

export interface IGenerateRequest {
	model: string;
	prompt: string;
}

export interface IChatRequest {
	model: string;
	messages: IChatMessage[];
}

export interface IGenerateResponseLine {
	response: string;
	done: boolean;
}

export interface IChatResponse {
	message: {
		role: string;
		content: string;
	};
}

export interface IRunSummary {
	output: string;
	totalChunks: number;
	succeeded: number;
	failed: number;
	inputBytes: number;
	outputBytes: number;
	compressionRatio?: number;
}
