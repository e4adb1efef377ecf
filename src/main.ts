import type { AxiosInstance } from 'axios';

import Logger from './utils/logger';
import { USAGE, parseCliArgs } from './utils/cli';
import { Compressor } from './core/compress/pipeline';
import { UsageError, errorMessage, isSetupError } from './utils/errors';
import { ConfigManager, loadConfigFile, resolveRunConfig, DEFAULT_CONFIG_PATH } from './utils/config';
import type { EnvConfig } from './utils/config';
import type { ICliOptions, ILogger, IRunSummary } from './types';

export interface IRunDependencies {
	env?: EnvConfig;
	logger?: ILogger;
	http?: AxiosInstance;
	print?: (text: string) => void;
	onSummary?: (summary: IRunSummary) => void;
}

/**
 * Runs the command line and resolves to the process exit code.
 * Per-chunk failures still exit with 0; only setup errors exit with 1.
 * @param argv Arguments without the node executable and script path
 */
export const run = async (argv: ReadonlyArray<string>, deps: IRunDependencies = {}): Promise<number> => {
	const print = deps.print ?? ((text: string) => console.error(text));

	let cli: ICliOptions;
	try {
		cli = parseCliArgs(argv);
	} catch (error) {
		if (error instanceof UsageError) {
			print(`Error: ${error.message}`);
			print(USAGE);
			return 1;
		}
		throw error;
	}

	if (cli.help) {
		print(USAGE);
		return 0;
	}

	let logger: ILogger | undefined = deps.logger;
	try {
		const env = deps.env ?? ConfigManager.getInstance().getConfig();
		logger ??= new Logger({ debug: cli.debug || env.DEBUG_MODE, logDir: env.LOG_DIR });

		const file = loadConfigFile(cli.config ?? DEFAULT_CONFIG_PATH, cli.config !== undefined);
		const config = resolveRunConfig(cli, env, file);
		logger.debug(`[MAIN] Resolved configuration: ${JSON.stringify(config)}`);

		const summary = await new Compressor(config, logger, deps.http).run();
		deps.onSummary?.(summary);
		return 0;
	} catch (error) {
		const message = isSetupError(error) ? error.message : `Unexpected failure: ${errorMessage(error)}`;
		if (logger) {
			logger.error(`[MAIN] ${message}`);
			if (!isSetupError(error) && error instanceof Error) logger.debug(error);
		} else {
			print(`Error: ${message}`);
		}
		return 1;
	}
};
