/**
 * Sampling granularities the host engine schedules data at
 */
export type Resolution = "tick" | "second" | "minute" | "hour" | "daily";

export const ALL_RESOLUTIONS: readonly Resolution[] = [
	"tick",
	"second",
	"minute",
	"hour",
	"daily",
];

/**
 * How the host should fetch a source
 */
export type TransportMedium =
	| "local-file"
	| "remote-file"
	| "rest"
	| "streaming"
	| "object-store";

export type FileFormat = "csv";

export type DataTimeZone = "UTC";

/**
 * Host-owned descriptor of a single data subscription
 */
export interface SubscriptionConfig {
	symbol: string;
	resolution?: Resolution;
	valueColumn?: string;
}

export interface SubscriptionDataSource {
	source: string;
	transportMedium: TransportMedium;
	format: FileFormat;
}

/**
 * Anything the host can replay on a timeline
 */
export interface TimedDataPoint {
	symbol: string;
	time: number;
	readonly endTime: number;
	value: number;
}
