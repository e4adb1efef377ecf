import { z } from 'zod';

import { ResponseParseError, errorMessage } from '../../utils/errors';
import type { IChatResponse, IGenerateResponseLine } from '../../types';

const GenerateLineSchema = z.object({
	response: z.string().default(''),
	done: z.boolean().default(false),
	error: z.string().optional(),
});

const ChatResponseSchema = z.object({
	message: z.object({
		role: z.string(),
		content: z.string(),
	}),
});

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false; reason: string } => {
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch (error) {
		return { ok: false, reason: errorMessage(error) };
	}
};

const parseGenerateLine = (line: string): IGenerateResponseLine => {
	const json = parseJson(line);
	if (!json.ok) {
		throw new ResponseParseError(`error parsing streaming response line: ${json.reason}`);
	}

	const result = GenerateLineSchema.safeParse(json.value);
	if (!result.success) {
		throw new ResponseParseError(`error parsing streaming response line: ${line}`);
	}
	if (result.data.error !== undefined) {
		throw new ResponseParseError(`model service reported an error: ${result.data.error}`);
	}
	return { response: result.data.response, done: result.data.done };
};

/**
 * Reads a newline-delimited JSON stream from the generate endpoint and
 * concatenates the `response` fragments until a line reports `done`.
 * Anything after the `done` line is ignored.
 * @throws {ResponseParseError} On the first malformed line
 */
export const parseGenerateStream = async (body: AsyncIterable<Buffer | string>): Promise<string> => {
	const decoder = new TextDecoder('utf-8');
	let buffered = '';
	let result = '';

	const consume = (line: string): boolean => {
		if (line.trim() === '') return false;
		const parsed = parseGenerateLine(line);
		result += parsed.response;
		return parsed.done;
	};

	for await (const piece of body) {
		buffered += typeof piece === 'string' ? piece : decoder.decode(piece, { stream: true });

		let newline = buffered.indexOf('\n');
		while (newline >= 0) {
			const line = buffered.slice(0, newline);
			buffered = buffered.slice(newline + 1);
			if (consume(line)) return result;
			newline = buffered.indexOf('\n');
		}
	}

	buffered += decoder.decode();
	consume(buffered);
	return result;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Extracts the assistant text from a chat endpoint response.
 * The canonical `{ message: { role, content } }` shape is tried first; response
 * shapes differ between service versions, so a plain key lookup of
 * `message.content` is attempted before giving up.
 * @throws {ResponseParseError} If no content can be found
 */
export const parseChatResponse = (body: string): string => {
	const json = parseJson(body);
	if (!json.ok) {
		throw new ResponseParseError(`error parsing chat response: ${json.reason}`);
	}

	const strict = ChatResponseSchema.safeParse(json.value);
	if (strict.success && strict.data.message.content !== '') {
		const response: IChatResponse = strict.data;
		return response.message.content;
	}

	if (isRecord(json.value)) {
		const message = json.value['message'];
		const content = isRecord(message) ? message['content'] : undefined;
		if (typeof content === 'string') {
			return content;
		}
	}

	throw new ResponseParseError(`could not extract content from chat API response: ${body}`);
};

const isAsyncIterable = (value: unknown): value is AsyncIterable<unknown> =>
	typeof value === 'object' && value !== null && Symbol.asyncIterator in value;

/**
 * Normalizes an HTTP response body (string, Buffer or readable stream) into
 * an async byte source.
 */
export async function* toByteSource(data: unknown): AsyncGenerator<Buffer | string> {
	if (data === undefined || data === null) return;

	if (typeof data === 'string' || Buffer.isBuffer(data)) {
		yield data;
		return;
	}

	if (isAsyncIterable(data)) {
		for await (const piece of data) {
			if (typeof piece === 'string' || Buffer.isBuffer(piece)) {
				yield piece;
			} else if (piece instanceof Uint8Array) {
				yield Buffer.from(piece);
			} else {
				throw new ResponseParseError(`unexpected response body chunk of type ${typeof piece}`);
			}
		}
		return;
	}

	throw new ResponseParseError(`unexpected response body of type ${typeof data}`);
}

/**
 * Reads a whole response body as UTF-8 text.
 */
export const readBody = async (data: unknown): Promise<string> => {
	const pieces: Buffer[] = [];
	for await (const piece of toByteSource(data)) {
		pieces.push(typeof piece === 'string' ? Buffer.from(piece, 'utf8') : piece);
	}
	return Buffer.concat(pieces).toString('utf8');
};
