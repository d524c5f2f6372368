#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { createLogger, loadEnvConfig } from "@tabfeed/core";
import { parseCliArgs, readStringFlag } from "./cliArgs";
import { createCliContext, runCommand, writeResult } from "./commands";

const logger = createLogger("series-cli", { stream: "stderr" });

const main = (): void => {
	const args = parseCliArgs(process.argv.slice(2));
	const envPath = readStringFlag(args.flags, "envPath");
	const env = loadEnvConfig(envPath ? path.resolve(envPath) : undefined);
	const context = createCliContext(env, (filePath) =>
		fs.readFileSync(path.resolve(filePath), "utf-8")
	);

	const result = runCommand(args, context);
	writeResult(result);
	process.exitCode = result.exitCode;
};

try {
	main();
} catch (error) {
	logger.error("series_cli_failed", {
		message: error instanceof Error ? error.message : String(error),
	});
	process.exitCode = 1;
}
