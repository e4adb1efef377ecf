import fs from 'fs';
import ms from 'ms';
import yaml from 'yaml';
import path from 'path';
import { z } from 'zod';
import { config } from 'dotenv';

import { ConfigError } from './errors';
import { ENDPOINT_MODES } from '../types';
import type { ICliOptions, IFileConfig, IRunConfig } from '../types';

export const DEFAULT_PROMPT = 'Compress this text fragment without losing important information:';

export const DEFAULT_RUN_CONFIG: Omit<IRunConfig, 'input'> = {
	output: 'llm.txt',
	model: 'llama3.2-vision:latest',
	baseUrl: 'http://localhost:11434/api',
	mode: 'generate',
	concurrency: 3,
	chunkSize: 4000,
	timeoutMs: 120_000,
	maxRetries: 3,
	retryDelayMs: 2_000,
	prompt: DEFAULT_PROMPT,
};

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/config.yml');

const EndpointModeSchema = z.enum(ENDPOINT_MODES, {
	errorMap: () => ({ message: `API endpoint must be one of: ${ENDPOINT_MODES.join(', ')}` }),
});

/**
 * Duration given either as milliseconds or as an `ms` string such as "2s".
 */
const toMilliseconds = (value: string): number | undefined => {
	try {
		const parsed = ms(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	} catch {
		// ms throws on empty or overly long strings
		return undefined;
	}
};

const DurationSchema = z.union([z.number(), z.string()]).transform((val, ctx) => {
	const parsed = typeof val === 'number' ? val : toMilliseconds(val);
	if (parsed === undefined) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${val}` });
		return z.NEVER;
	}
	return parsed;
});

/**
 * Schema for validating environment variables
 */
const EnvSchema = z.object({
	DEBUG_MODE: z.union([z.boolean(), z.string()]).transform((val) => {
		if (typeof val === 'string') {
			return val.toLowerCase() === 'true';
		}
		return val;
	}),
	OLLAMA_MODEL: z.string().optional(),
	OLLAMA_URL: z.string().url().optional(),
	OLLAMA_API: EndpointModeSchema.optional(),
	LOG_DIR: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

const FileConfigSchema = z.object({
	compress: z.object({
		model: z.string().optional(),
		url: z.string().url().optional(),
		api: EndpointModeSchema.optional(),
		concurrency: z.number().optional(),
		chunk_size: z.number().optional(),
		timeout: DurationSchema.optional(),
		retries: z.number().optional(),
		retry_delay: DurationSchema.optional(),
		prompt: z.string().optional(),
	}).optional(),
});

const RunConfigSchema = z.object({
	input: z.string().min(1, 'Input file is required'),
	output: z.string().min(1),
	model: z.string().min(1),
	baseUrl: z.string().url(),
	mode: EndpointModeSchema,
	concurrency: z.number().int().min(1),
	chunkSize: z.number().int().min(1),
	timeoutMs: z.number().int().positive(),
	maxRetries: z.number().int().min(1),
	retryDelayMs: z.number().int().min(0),
	prompt: z.string(),
});

const describeIssues = (error: z.ZodError): string =>
	error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join(', ');

/**
 * Validates raw environment variables.
 * @throws {ConfigError} If a variable is present but malformed
 */
export const parseEnv = (env: NodeJS.ProcessEnv): EnvConfig => {
	const result = EnvSchema.safeParse({
		DEBUG_MODE: env.DEBUG_MODE || false,
		OLLAMA_MODEL: env.OLLAMA_MODEL || undefined,
		OLLAMA_URL: env.OLLAMA_URL || undefined,
		OLLAMA_API: env.OLLAMA_API || undefined,
		LOG_DIR: env.LOG_DIR || undefined,
	});
	if (!result.success) {
		throw new ConfigError(`Missing or invalid environment variables: ${describeIssues(result.error)}`);
	}
	return result.data;
};

/**
 * Manages environment-derived settings.
 * Implements the Singleton pattern to ensure only one configuration instance exists
 * @class ConfigManager
 */
export class ConfigManager {
	private static instance: ConfigManager;
	private config: EnvConfig;

	/**
	 * Loads variables from `.env.<NODE_ENV>` or `.env` when either file exists,
	 * then validates them.
	 * @throws {ConfigError} If a file cannot be loaded or a variable is invalid
	 */
	private constructor() {
		const environment = process.env.NODE_ENV || 'prod';
		const envPath = [path.resolve(process.cwd(), `.env.${environment}`), path.resolve(process.cwd(), '.env')]
			.find((candidate) => fs.existsSync(candidate));

		if (envPath) {
			const result = config({ path: envPath });
			if (result.error) {
				throw new ConfigError(`Failed to load environment variables: ${result.error.message}`);
			}
		}

		this.config = parseEnv(process.env);
	}

	/**
	 * Gets the singleton instance of ConfigManager
	 * Creates a new instance if one doesn't exist
	 */
	public static getInstance(): ConfigManager {
		if (!ConfigManager.instance) {
			ConfigManager.instance = new ConfigManager();
		}
		return ConfigManager.instance;
	}

	public getConfig(): EnvConfig {
		return this.config;
	}
}

/**
 * Loads the YAML configuration file.
 * A missing file at the default location is not an error; a missing explicit file is.
 * @throws {ConfigError} If the file is unreadable or does not match the expected shape
 */
export const loadConfigFile = (configPath: string = DEFAULT_CONFIG_PATH, required: boolean = false): IFileConfig => {
	if (!fs.existsSync(configPath)) {
		if (required) {
			throw new ConfigError(`Configuration file not found: ${configPath}`);
		}
		return {};
	}

	let raw: unknown;
	try {
		raw = yaml.parse(fs.readFileSync(configPath, 'utf8'));
	} catch (error) {
		throw new ConfigError(`Failed to load configuration: ${configPath}`, { cause: error });
	}

	const result = FileConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(`Invalid configuration in ${configPath}: ${describeIssues(result.error)}`);
	}
	return result.data;
};

/**
 * Merges defaults, the YAML file, environment and CLI flags (in increasing precedence)
 * into a validated run configuration.
 * @throws {ConfigError} If the merged configuration is invalid
 */
export const resolveRunConfig = (cli: ICliOptions, env: EnvConfig, file: IFileConfig = {}): IRunConfig => {
	const parsedFile = FileConfigSchema.safeParse(file);
	if (!parsedFile.success) {
		throw new ConfigError(`Invalid configuration: ${describeIssues(parsedFile.error)}`);
	}
	const section = parsedFile.data.compress ?? {};

	const merged = {
		input: cli.input ?? '',
		output: cli.output ?? DEFAULT_RUN_CONFIG.output,
		model: cli.model ?? env.OLLAMA_MODEL ?? section.model ?? DEFAULT_RUN_CONFIG.model,
		baseUrl: cli.url ?? env.OLLAMA_URL ?? section.url ?? DEFAULT_RUN_CONFIG.baseUrl,
		mode: cli.api ?? env.OLLAMA_API ?? section.api ?? DEFAULT_RUN_CONFIG.mode,
		concurrency: cli.concurrency ?? section.concurrency ?? DEFAULT_RUN_CONFIG.concurrency,
		chunkSize: cli.chunkSize ?? section.chunk_size ?? DEFAULT_RUN_CONFIG.chunkSize,
		timeoutMs: section.timeout ?? DEFAULT_RUN_CONFIG.timeoutMs,
		maxRetries: section.retries ?? DEFAULT_RUN_CONFIG.maxRetries,
		retryDelayMs: section.retry_delay ?? DEFAULT_RUN_CONFIG.retryDelayMs,
		prompt: section.prompt ?? DEFAULT_RUN_CONFIG.prompt,
	};

	const result = RunConfigSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`);
	}
	return Object.freeze(result.data);
};
