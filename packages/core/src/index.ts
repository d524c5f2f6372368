/**
 * Core package centralizes shared host contracts, configuration and logging.
 * Everything else in the workspace depends on these primitives.
 */
export * from "./types";
export type { CustomDataSource } from "./data/CustomDataSource";
export { DEFAULT_VALUE_COLUMN, loadEnvConfig } from "./config";
export type { EnvConfig } from "./config";
export { ONE_DAY_MS } from "./time/constants";
export { createLogger } from "./utils/logger";
export type { LoggerOptions, LogStream, ModuleLogger } from "./utils/logger";
export { formatCalendarDate, parseCalendarDate } from "./time/time";
