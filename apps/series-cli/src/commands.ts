import { createLogger, formatCalendarDate } from "@tabfeed/core";
import type { EnvConfig } from "@tabfeed/core";
import {
	ColumnarSeriesAdapter,
	configureCredentials,
	CredentialRegistry,
	readColumnarSeries,
} from "@tabfeed/data";
import type { DataProviderLogger } from "@tabfeed/data";
import type { ArgValue, ParsedCliArgs } from "./cliArgs";
import { readStringFlag } from "./cliArgs";

export const USAGE = `Usage:
  series-cli source --symbol <dataset>
  series-cli parse --file <path> --symbol <dataset> [options]

Options:
  --symbol <dataset>       Dataset code, e.g. WIKI/AAPL (or second positional)
  --file <path>            Local CSV file previously downloaded from the source URL
  --valueColumn <column>   Column used as the canonical value (defaults to DEFAULT_VALUE_COLUMN)
  --json                   Print points and failures as JSON
  --envPath <path>         Custom .env path
  --help                   Show this message
`;

export interface CommandContext {
	env: EnvConfig;
	credentials: CredentialRegistry;
	readFile: (filePath: string) => string;
	logger?: DataProviderLogger;
	now?: () => number;
}

export interface CommandResult {
	exitCode: number;
	stdout: string[];
	stderr: string[];
}

/**
 * Context for a CLI process. Its loggers write to stderr and leave stdout to
 * command results.
 */
export const createCliContext = (
	env: EnvConfig,
	readFile: (filePath: string) => string
): CommandContext => {
	const credentials = configureCredentials(
		env,
		new CredentialRegistry(createLogger("credentials", { stream: "stderr" }))
	);
	return {
		env,
		credentials,
		readFile,
		logger: createLogger("series-cli", { stream: "stderr" }),
	};
};

export const writeResult = (result: CommandResult): void => {
	result.stdout.forEach((line) => console.log(line));
	result.stderr.forEach((line) => console.error(line));
};

const fail = (message: string): CommandResult => ({
	exitCode: 1,
	stdout: [],
	stderr: [message, USAGE],
});

export const runSourceCommand = (
	flags: Record<string, ArgValue>,
	context: CommandContext
): CommandResult => {
	const symbol = readStringFlag(flags, "symbol");
	if (!symbol) {
		return fail("Missing required --symbol");
	}
	const adapter = new ColumnarSeriesAdapter({
		credentials: context.credentials,
		baseUrl: context.env.nasdaqBaseUrl,
		logger: context.logger,
	});
	const now = context.now ?? Date.now;
	const { source } = adapter.getSource({ symbol }, now(), false);
	const stderr = context.credentials.isConfigured
		? []
		: ["NASDAQ_DATA_LINK_API_KEY is not set; the URL carries a placeholder key"];
	return { exitCode: 0, stdout: [source], stderr };
};

export const runParseCommand = (
	flags: Record<string, ArgValue>,
	context: CommandContext
): CommandResult => {
	const symbol = readStringFlag(flags, "symbol");
	const file = readStringFlag(flags, "file");
	if (!symbol || !file) {
		return fail("Missing required --symbol or --file");
	}
	const valueColumn =
		readStringFlag(flags, "valueColumn") ?? context.env.defaultValueColumn;

	const result = readColumnarSeries({
		config: { symbol, valueColumn },
		contents: context.readFile(file),
		credentials: context.credentials,
		baseUrl: context.env.nasdaqBaseUrl,
		asOfDate: (context.now ?? Date.now)(),
		logger: context.logger,
	});
	const exitCode = result.failures.length ? 2 : 0;

	if (flags.json === true) {
		return {
			exitCode,
			stdout: [
				JSON.stringify(
					{
						symbol,
						schema: result.schema,
						points: result.points,
						failures: result.failures,
					},
					null,
					2
				),
			],
			stderr: [],
		};
	}

	return {
		exitCode,
		stdout: result.points.map(
			(point) =>
				`${formatCalendarDate(point.time)} ${point.value} (${point.valueColumn ?? "-"})`
		),
		stderr: result.failures.map(
			(failure) =>
				`line ${failure.lineNumber}: ${failure.code} ${failure.message}`
		),
	};
};

export const runCommand = (
	args: ParsedCliArgs,
	context: CommandContext
): CommandResult => {
	if (args.flags.help === true) {
		return { exitCode: 0, stdout: [USAGE], stderr: [] };
	}
	if (!args.command) {
		return fail("Missing command");
	}
	switch (args.command) {
		case "source":
			return runSourceCommand(args.flags, context);
		case "parse":
			return runParseCommand(args.flags, context);
		default:
			return fail(`Unknown command: ${args.command}`);
	}
};
