import type {
	DataTimeZone,
	Resolution,
	SubscriptionConfig,
	SubscriptionDataSource,
	TimedDataPoint,
} from "../types";

/**
 * Contract the host engine drives to ingest a custom data feed.
 *
 * The host owns transport, scheduling and alignment:
 * - `getSource` tells it where the file lives and how to fetch it
 * - `reader` is called once per line, in file order, on a single instance
 * - the metadata methods drive scheduling and gap tolerance
 */
export interface CustomDataSource<TPoint extends TimedDataPoint> {
	/**
	 * Resolve the file location for a subscription.
	 * @param asOfDate - Epoch ms of the requested day
	 * @param isLiveMode - True when trading live, false when backtesting
	 */
	getSource(
		config: SubscriptionConfig,
		asOfDate: number,
		isLiveMode: boolean
	): SubscriptionDataSource;

	/**
	 * Parse one line of the file.
	 * @returns A data point, or null for lines that carry no data
	 */
	reader(
		config: SubscriptionConfig,
		line: string,
		asOfDate: number,
		isLiveMode: boolean
	): TPoint | null;

	/**
	 * When true the host does not log missing files for this feed
	 */
	isSparseData(): boolean;
	defaultResolution(): Resolution;
	supportedResolutions(): readonly Resolution[];
	dataTimeZone(): DataTimeZone;

	/** Span in ms that one data point covers */
	readonly period: number;
}
