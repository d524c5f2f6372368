import { ONE_DAY_MS } from "@tabfeed/core";
import type { TimedDataPoint } from "@tabfeed/core";

interface ColumnarDataPointInit {
	symbol: string;
	time: number;
	schema: readonly string[];
	values: ReadonlyMap<string, number>;
	value?: number;
	valueColumn?: string | null;
}

/**
 * One dated row of a columnar feed.
 *
 * `values` holds every numeric column of the row keyed by its header name;
 * `value` is the canonical price picked by the adapter's value column policy
 * and stays 0 when no column qualified. The date column stays in `schema`
 * and surfaces as `time`, never in `values`.
 */
export class ColumnarDataPoint implements TimedDataPoint {
	readonly period = ONE_DAY_MS;
	symbol: string;
	time: number;
	value: number;
	readonly valueColumn: string | null;
	readonly schema: readonly string[];
	readonly values: ReadonlyMap<string, number>;

	constructor(init: ColumnarDataPointInit) {
		this.symbol = init.symbol;
		this.time = init.time;
		this.schema = init.schema;
		this.values = init.values;
		this.value = init.value ?? 0;
		this.valueColumn = init.valueColumn ?? null;
	}

	get endTime(): number {
		return this.time + this.period;
	}

	set endTime(value: number) {
		this.time = value - this.period;
	}

	getProperty(name: string): number | undefined {
		return this.values.get(name.trim().toLowerCase());
	}

	hasProperty(name: string): boolean {
		return this.values.has(name.trim().toLowerCase());
	}

	toJSON(): Record<string, unknown> {
		return {
			symbol: this.symbol,
			time: this.time,
			endTime: this.endTime,
			value: this.value,
			valueColumn: this.valueColumn,
			values: Object.fromEntries(this.values),
		};
	}
}
