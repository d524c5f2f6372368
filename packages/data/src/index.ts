export type { DataProviderLogger } from "./types";
export { ColumnarDataPoint } from "./columnar/ColumnarDataPoint";
export {
	ColumnarSeriesAdapter,
	DEFAULT_DATASETS_URL,
} from "./columnar/ColumnarSeriesAdapter";
export type { ColumnarSeriesAdapterOptions } from "./columnar/ColumnarSeriesAdapter";
export {
	CredentialRegistry,
	PLACEHOLDER_API_KEY,
	configureCredentials,
	defaultCredentialRegistry,
} from "./columnar/credentials";
export { ColumnarParseError } from "./columnar/errors";
export type { ColumnarParseErrorCode } from "./columnar/errors";
export {
	ColumnarLineParser,
	FIELD_DELIMITER,
	parseDecimal,
} from "./columnar/lineParser";
export type { LineParserState, ParsedLine } from "./columnar/lineParser";
export { readColumnarSeries } from "./columnar/readColumnarSeries";
export type {
	ColumnarLineFailure,
	ColumnarSeriesResult,
} from "./columnar/readColumnarSeries";
export {
	DEFAULT_VALUE_KEYWORDS,
	createValueColumnPolicy,
	normalizeColumnName,
	selectValueColumn,
} from "./columnar/valueColumnPolicy";
