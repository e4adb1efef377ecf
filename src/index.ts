#!/usr/bin/env node
import { run } from './main';

process.on('unhandledRejection', (error: unknown) => {
	console.error(`[UNHANDLED-REJECTION] ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
	process.exitCode = 1;
});

run(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error(`[INDEX] Fatal error: ${error instanceof Error ? error.message : String(error)}`);
		process.exitCode = 1;
	});
