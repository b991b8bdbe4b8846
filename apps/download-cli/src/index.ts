#!/usr/bin/env node

import process from "node:process";
import {
	TapeArchiveError,
	createLogger,
	loadArchiveConfig,
	loadEnvFiles,
} from "@tapearchive/core";
import { parseCliArgs } from "./cliArgs";
import {
	USAGE,
	runDownload,
	runLoad,
	runSymbols,
	runTickers,
} from "./commands";

const cliLogger = createLogger("cli");

const main = async (): Promise<number> => {
	const { command, args } = parseCliArgs(process.argv.slice(2));
	if (!command || args.help) {
		console.log(USAGE);
		return command ? 0 : 1;
	}

	const envFiles = loadEnvFiles(process.cwd());
	cliLogger.debug("env_loaded", { files: envFiles });
	const config = loadArchiveConfig();

	switch (command) {
		case "download":
			return runDownload(args, config);
		case "load":
			return runLoad(args, config);
		case "symbols":
			return runSymbols(args);
		case "tickers":
			return runTickers(args);
		default:
			console.error(`Unknown command "${command}"\n`);
			console.log(USAGE);
			return 1;
	}
};

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		if (error instanceof TapeArchiveError) {
			console.error(`${error.name}: ${error.message}`);
		} else {
			cliLogger.error("cli_failed", { error });
		}
		process.exitCode = 1;
	});
