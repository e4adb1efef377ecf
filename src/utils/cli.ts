import { parseArgs } from 'util';

import { UsageError, errorMessage } from './errors';
import { DEFAULT_RUN_CONFIG } from './config';
import { ENDPOINT_MODES } from '../types';
import type { EndpointMode, ICliOptions } from '../types';

export const USAGE = `Usage: llm-squeeze -input <file> [options]

Options:
  -input <path>        Path to the input file (required)
  -output <path>       Output file name (default "${DEFAULT_RUN_CONFIG.output}")
  -model <name>        Ollama model name to use (default "${DEFAULT_RUN_CONFIG.model}")
  -api <endpoint>      Ollama API endpoint: 'generate' or 'chat' (default "${DEFAULT_RUN_CONFIG.mode}")
  -url <url>           Ollama API base URL (default "${DEFAULT_RUN_CONFIG.baseUrl}")
  -concurrency <n>     Maximum concurrent requests (default ${DEFAULT_RUN_CONFIG.concurrency})
  -chunk-size <bytes>  Maximum chunk size in bytes (default ${DEFAULT_RUN_CONFIG.chunkSize})
  -config <path>       YAML configuration file
  -debug               Enable debug logging
  -help                Show this message`;

const isEndpointMode = (value: string): value is EndpointMode => ENDPOINT_MODES.some((mode) => mode === value);

/**
 * Accepts single-dash long flags (`-input`) alongside `--input`.
 */
const normalizeFlag = (arg: string): string => (/^-[A-Za-z][\w-]+(=.*)?$/.test(arg) ? `-${arg}` : arg);

const parsePositiveInt = (name: string, value: string | undefined): number | undefined => {
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new UsageError(`-${name} must be a positive integer, got "${value}"`);
	}
	return parsed;
};

const readArgs = (argv: ReadonlyArray<string>) =>
	parseArgs({
		args: argv.map(normalizeFlag),
		allowPositionals: false,
		strict: true,
		options: {
			input: { type: 'string' },
			output: { type: 'string' },
			model: { type: 'string' },
			api: { type: 'string' },
			url: { type: 'string' },
			concurrency: { type: 'string' },
			'chunk-size': { type: 'string' },
			config: { type: 'string' },
			debug: { type: 'boolean', default: false },
			help: { type: 'boolean', short: 'h', default: false },
		},
	});

/**
 * Parses command-line arguments (without the node executable and script path).
 * @throws {UsageError} On unknown flags, a missing -input or an invalid -api
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): ICliOptions => {
	let parsed: ReturnType<typeof readArgs>;
	try {
		parsed = readArgs(argv);
	} catch (error) {
		throw new UsageError(errorMessage(error));
	}
	const { values } = parsed;

	const options: ICliOptions = {
		input: values.input,
		output: values.output,
		model: values.model,
		api: values.api,
		url: values.url,
		concurrency: parsePositiveInt('concurrency', values.concurrency),
		chunkSize: parsePositiveInt('chunk-size', values['chunk-size']),
		config: values.config,
		debug: values.debug ?? false,
		help: values.help ?? false,
	};

	if (options.help) return options;

	if (!options.input) {
		throw new UsageError('Input file is required');
	}
	if (options.api !== undefined && !isEndpointMode(options.api)) {
		throw new UsageError("API endpoint must be 'generate' or 'chat'");
	}
	return options;
};
