import { describe, expect, it } from 'vitest';

import { DEFAULT_PROMPT } from '../../utils/config';
import { buildRequest, endpointUrl } from './request_builder';

describe('buildRequest', () => {
	it('builds a generate payload with the instruction prefix', () => {
		const body = buildRequest('generate', 'test-model', 'some text');

		expect(JSON.parse(body)).toEqual({
			model: 'test-model',
			prompt: `${DEFAULT_PROMPT} some text`,
		});
	});

	it('builds a chat payload with a single user message', () => {
		const body = buildRequest('chat', 'test-model', 'some text');

		expect(JSON.parse(body)).toEqual({
			model: 'test-model',
			messages: [{ role: 'user', content: `${DEFAULT_PROMPT} some text` }],
		});
	});

	it('uses a custom prompt when given', () => {
		expect(buildRequest('generate', 'm', 'body', 'Shorten:')).toBe('{"model":"m","prompt":"Shorten: body"}');
	});

	it('escapes control characters and quotes in chunk text', () => {
		const body = buildRequest('generate', 'm', 'line "one"\nline two', 'P');

		expect(JSON.parse(body)).toEqual({ model: 'm', prompt: 'P line "one"\nline two' });
	});
});

describe('endpointUrl', () => {
	it('joins the base URL and the mode', () => {
		expect(endpointUrl('http://localhost:11434/api', 'generate')).toBe('http://localhost:11434/api/generate');
		expect(endpointUrl('http://localhost:11434/api/', 'chat')).toBe('http://localhost:11434/api/chat');
	});
});
