import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export interface EnvConfig {
	nasdaqApiKey?: string;
	nasdaqBaseUrl?: string;
	defaultValueColumn: string;
}

export const DEFAULT_VALUE_COLUMN = "close";

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["tsconfig.json", ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = current;
			return current;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");

const getEnvVar = (key: string, fallback: string): string => {
	const value = process.env[key]?.trim();
	return value ? value : fallback;
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

/**
 * Load the `.env` at `envPath` (once per path) and read the feed settings.
 * Variables already present in the process environment win over the file.
 */
export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		nasdaqApiKey: readOptionalEnvVar("NASDAQ_DATA_LINK_API_KEY"),
		nasdaqBaseUrl: readOptionalEnvVar("NASDAQ_DATA_LINK_BASE_URL"),
		defaultValueColumn: getEnvVar("DEFAULT_VALUE_COLUMN", DEFAULT_VALUE_COLUMN),
	};
};
