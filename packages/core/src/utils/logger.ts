export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export type LogStream = "stdout" | "stderr";

export interface LoggerOptions {
	/** Where log lines go, stdout by default */
	stream?: LogStream;
}

const writerFor = (stream: LogStream): ((line: string) => void) =>
	stream === "stderr"
		? (line) => console.error(line)
		: (line) => console.log(line);

function log(payload: BaseLogPayload, stream: LogStream): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };
	const write = writerFor(stream);

	if (prettyEnabled) {
		printPretty(base, write);
	}

	if (jsonEnabled) {
		try {
			write(JSON.stringify(sanitizeValue(base, new WeakSet())));
		} catch (err) {
			write(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (
	moduleName: string,
	options: LoggerOptions = {}
): ModuleLogger => {
	const stream = options.stream ?? "stdout";
	return {
		debug: (event, data) =>
			log({ level: "debug", event, module: moduleName, ...(data ?? {}) }, stream),
		info: (event, data) =>
			log({ level: "info", event, module: moduleName, ...(data ?? {}) }, stream),
		warn: (event, data) =>
			log({ level: "warn", event, module: moduleName, ...(data ?? {}) }, stream),
		error: (event, data) =>
			log({ level: "error", event, module: moduleName, ...(data ?? {}) }, stream),
	};
};

export const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const formatPrettyValue = (value: unknown): string => {
	if (value === undefined || value === null) {
		return "-";
	}
	if (typeof value === "object") {
		return JSON.stringify(sanitizeValue(value, new WeakSet()));
	}
	return String(value);
};

function printPretty(base: BaseLogPayload, write: (line: string) => void): void {
	const { level, event, module, ts, ...rest } = base;
	write(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	const entries = Object.entries(rest);
	if (!entries.length) {
		return;
	}
	try {
		write(
			entries
				.map(([key, value]) => `  ${key}=${formatPrettyValue(value)}`)
				.join("\n")
		);
	} catch (err) {
		console.warn(
			`[logger] pretty render error: ${
				err instanceof Error ? err.message : "unknown"
			}`
		);
	}
}
