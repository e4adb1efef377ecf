import { SerializationError, errorMessage } from '../../utils/errors';
import { DEFAULT_PROMPT } from '../../utils/config';
import type { EndpointMode, IChatRequest, IGenerateRequest } from '../../types';

/**
 * Full endpoint URL for a mode, e.g. `http://localhost:11434/api/generate`.
 */
export const endpointUrl = (baseUrl: string, mode: EndpointMode): string => `${baseUrl.replace(/\/+$/, '')}/${mode}`;

const buildPayload = (mode: EndpointMode, model: string, text: string): IGenerateRequest | IChatRequest => {
	switch (mode) {
		case 'generate':
			return { model, prompt: text };
		case 'chat':
			return { model, messages: [{ role: 'user', content: text }] };
	}
};

/**
 * Serializes the request body for the given endpoint mode.
 * @throws {SerializationError} If the payload cannot be encoded
 */
export const buildRequest = (mode: EndpointMode, model: string, chunkText: string, prompt: string = DEFAULT_PROMPT): string => {
	const payload = buildPayload(mode, model, `${prompt} ${chunkText}`);
	try {
		return JSON.stringify(payload);
	} catch (error) {
		throw new SerializationError(`error creating request: ${errorMessage(error)}`, { cause: error });
	}
};
