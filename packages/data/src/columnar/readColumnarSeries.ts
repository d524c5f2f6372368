import type { SubscriptionConfig } from "@tabfeed/core";
import type { DataProviderLogger } from "../types";
import type { ColumnarDataPoint } from "./ColumnarDataPoint";
import { ColumnarSeriesAdapter } from "./ColumnarSeriesAdapter";
import type { ColumnarSeriesAdapterOptions } from "./ColumnarSeriesAdapter";
import { ColumnarParseError } from "./errors";
import type { ColumnarParseErrorCode } from "./errors";

export interface ColumnarLineFailure {
	lineNumber: number;
	code: ColumnarParseErrorCode;
	message: string;
}

export interface ColumnarSeriesResult {
	schema: readonly string[];
	points: ColumnarDataPoint[];
	failures: ColumnarLineFailure[];
}

interface ReadColumnarSeriesOptions
	extends Omit<ColumnarSeriesAdapterOptions, "valueColumn" | "logger"> {
	config: SubscriptionConfig;
	contents: string;
	asOfDate?: number;
	isLiveMode?: boolean;
	logger?: DataProviderLogger;
}

/**
 * Replay a whole downloaded file through a fresh adapter.
 *
 * Blank lines are skipped. Lines the adapter rejects are logged and reported
 * in `failures`; reading carries on with the next line.
 */
export const readColumnarSeries = (
	options: ReadColumnarSeriesOptions
): ColumnarSeriesResult => {
	const { config, contents, logger } = options;
	const adapter = ColumnarSeriesAdapter.forSubscription(config, {
		credentials: options.credentials,
		baseUrl: options.baseUrl,
		logger,
	});
	const asOfDate = options.asOfDate ?? Date.now();
	const isLiveMode = options.isLiveMode ?? false;
	const points: ColumnarDataPoint[] = [];
	const failures: ColumnarLineFailure[] = [];

	const lines = contents.split(/\r?\n/);
	lines.forEach((line, index) => {
		if (!line.trim()) {
			return;
		}
		try {
			const point = adapter.reader(config, line, asOfDate, isLiveMode);
			if (point) {
				points.push(point);
			}
		} catch (error) {
			if (!(error instanceof ColumnarParseError)) {
				throw error;
			}
			const failure = {
				lineNumber: index + 1,
				code: error.code,
				message: error.message,
			};
			failures.push(failure);
			logger?.warn?.("series_line_rejected", {
				symbol: config.symbol,
				...failure,
			});
		}
	});

	logger?.info?.("series_read_complete", {
		symbol: config.symbol,
		points: points.length,
		failures: failures.length,
	});

	return { schema: adapter.schema ?? [], points, failures };
};
