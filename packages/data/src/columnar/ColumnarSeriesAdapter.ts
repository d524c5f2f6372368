import {
	ALL_RESOLUTIONS,
	createLogger,
	DEFAULT_VALUE_COLUMN,
	ONE_DAY_MS,
} from "@tabfeed/core";
import type {
	CustomDataSource,
	DataTimeZone,
	Resolution,
	SubscriptionConfig,
	SubscriptionDataSource,
} from "@tabfeed/core";
import type { DataProviderLogger } from "../types";
import { ColumnarDataPoint } from "./ColumnarDataPoint";
import { CredentialRegistry, defaultCredentialRegistry } from "./credentials";
import { ColumnarLineParser } from "./lineParser";
import { createValueColumnPolicy, selectValueColumn } from "./valueColumnPolicy";

export const DEFAULT_DATASETS_URL = "https://data.nasdaq.com/api/v3/datasets";

export interface ColumnarSeriesAdapterOptions {
	/** Column used as the canonical value ahead of the default keywords */
	valueColumn?: string;
	credentials?: CredentialRegistry;
	baseUrl?: string;
	logger?: DataProviderLogger;
}

/**
 * Nasdaq Data Link (Quandl v3) dataset feed.
 *
 * Keeps per-file state: create one instance per file session and feed it
 * the file's lines in order, header first.
 */
export class ColumnarSeriesAdapter implements CustomDataSource<ColumnarDataPoint> {
	readonly valueColumnPolicy: readonly string[];
	readonly period = ONE_DAY_MS;
	private readonly parser = new ColumnarLineParser();
	private readonly credentials: CredentialRegistry;
	private readonly baseUrl: string;
	private readonly logger: DataProviderLogger;

	constructor(options: ColumnarSeriesAdapterOptions = {}) {
		this.valueColumnPolicy = createValueColumnPolicy(
			options.valueColumn ?? DEFAULT_VALUE_COLUMN
		);
		this.credentials = options.credentials ?? defaultCredentialRegistry;
		this.baseUrl = (options.baseUrl ?? DEFAULT_DATASETS_URL).replace(/\/+$/, "");
		this.logger = options.logger ?? createLogger("columnar-series");
	}

	static forSubscription(
		config: SubscriptionConfig,
		options: Omit<ColumnarSeriesAdapterOptions, "valueColumn"> = {}
	): ColumnarSeriesAdapter {
		return new ColumnarSeriesAdapter({
			...options,
			valueColumn: config.valueColumn,
		});
	}

	static setCredential(code: string): void {
		defaultCredentialRegistry.set(code);
	}

	static get isCredentialSet(): boolean {
		return defaultCredentialRegistry.isConfigured;
	}

	get schema(): readonly string[] | null {
		return this.parser.schema;
	}

	getSource(
		config: SubscriptionConfig,
		_asOfDate: number,
		_isLiveMode: boolean
	): SubscriptionDataSource {
		const source = `${this.baseUrl}/${config.symbol}.csv?order=asc&api_key=${this.credentials.apiKey}`;
		return { source, transportMedium: "remote-file", format: "csv" };
	}

	reader(
		config: SubscriptionConfig,
		line: string,
		_asOfDate: number,
		_isLiveMode: boolean
	): ColumnarDataPoint | null {
		const parsed = this.parser.parse(line);

		if (parsed.kind === "header") {
			this.logger.debug?.("columnar_header_captured", {
				symbol: config.symbol,
				columns: parsed.schema,
			});
			if (!this.hasValueColumn(parsed.schema)) {
				this.logger.warn?.("columnar_value_column_missing", {
					symbol: config.symbol,
					columns: parsed.schema,
					keywords: this.valueColumnPolicy,
				});
			}
			return null;
		}

		const { schema } = parsed;
		const valueColumn = selectValueColumn(
			this.valueColumnPolicy,
			schema,
			parsed.values
		);
		if (valueColumn === null && this.hasValueColumn(schema)) {
			this.logger.debug?.("columnar_row_value_unfilled", {
				symbol: config.symbol,
				time: parsed.time,
			});
		}

		return new ColumnarDataPoint({
			symbol: config.symbol,
			time: parsed.time,
			schema,
			values: parsed.values,
			value: valueColumn === null ? 0 : parsed.values.get(valueColumn),
			valueColumn,
		});
	}

	private hasValueColumn(schema: readonly string[]): boolean {
		return this.valueColumnPolicy.some((keyword) => schema.includes(keyword));
	}

	isSparseData(): boolean {
		return true;
	}

	defaultResolution(): Resolution {
		return "daily";
	}

	supportedResolutions(): readonly Resolution[] {
		return ALL_RESOLUTIONS;
	}

	dataTimeZone(): DataTimeZone {
		return "UTC";
	}
}
