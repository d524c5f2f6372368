export type ColumnarParseErrorCode =
	| "MALFORMED_DATE"
	| "MALFORMED_NUMBER"
	| "SCHEMA_MISMATCH";

/**
 * A single data line that cannot be turned into a record.
 * The host decides whether to skip the line or stop the ingestion.
 */
export class ColumnarParseError extends Error {
	constructor(
		message: string,
		public readonly code: ColumnarParseErrorCode,
		public readonly line: string,
		public readonly column?: number,
		public override readonly cause?: unknown
	) {
		super(message, { cause });
		this.name = "ColumnarParseError";
	}

	static malformedDate(
		line: string,
		field: string,
		cause?: unknown
	): ColumnarParseError {
		return new ColumnarParseError(
			`Malformed date "${field}" in column 0, expected YYYY-MM-DD`,
			"MALFORMED_DATE",
			line,
			0,
			cause
		);
	}

	static malformedNumber(
		line: string,
		column: number,
		columnName: string,
		field: string
	): ColumnarParseError {
		return new ColumnarParseError(
			`Malformed number "${field}" in column ${column} (${columnName})`,
			"MALFORMED_NUMBER",
			line,
			column
		);
	}

	static schemaMismatch(
		line: string,
		fieldCount: number,
		schemaLength: number
	): ColumnarParseError {
		return new ColumnarParseError(
			`Row has ${fieldCount} fields but the header declared ${schemaLength} columns`,
			"SCHEMA_MISMATCH",
			line
		);
	}
}
