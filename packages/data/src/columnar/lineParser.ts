import { parseCalendarDate } from "@tabfeed/core";
import { ColumnarParseError } from "./errors";
import { normalizeColumnName } from "./valueColumnPolicy";

export const FIELD_DELIMITER = ",";

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type LineParserState =
	| { kind: "awaiting_header" }
	| { kind: "parsing_rows"; schema: readonly string[] };

export type ParsedLine =
	| { kind: "header"; schema: readonly string[] }
	| {
			kind: "row";
			schema: readonly string[];
			time: number;
			values: Map<string, number>;
	  };

export const parseDecimal = (field: string): number | null => {
	const trimmed = field.trim();
	if (!DECIMAL_PATTERN.test(trimmed)) {
		return null;
	}
	const parsed = Number(trimmed);
	return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Two-state reader for one CSV file: the first line is always the header,
 * every later line is a dated row addressed by that header.
 */
export class ColumnarLineParser {
	private current: LineParserState = { kind: "awaiting_header" };

	get state(): LineParserState {
		return this.current;
	}

	get schema(): readonly string[] | null {
		return this.current.kind === "parsing_rows" ? this.current.schema : null;
	}

	parse(line: string): ParsedLine {
		const fields = line.split(FIELD_DELIMITER);

		if (this.current.kind === "awaiting_header") {
			const schema = Object.freeze(fields.map(normalizeColumnName));
			this.current = { kind: "parsing_rows", schema };
			return { kind: "header", schema };
		}

		return this.parseRow(line, fields, this.current.schema);
	}

	private parseRow(
		line: string,
		fields: string[],
		schema: readonly string[]
	): ParsedLine {
		if (fields.length > schema.length) {
			throw ColumnarParseError.schemaMismatch(
				line,
				fields.length,
				schema.length
			);
		}

		let time: number;
		try {
			time = parseCalendarDate(fields[0]);
		} catch (error) {
			throw ColumnarParseError.malformedDate(line, fields[0], error);
		}

		const values = new Map<string, number>();
		for (let i = 1; i < fields.length; i++) {
			const value = parseDecimal(fields[i]);
			if (value === null) {
				throw ColumnarParseError.malformedNumber(line, i, schema[i], fields[i]);
			}
			values.set(schema[i], value);
		}

		return { kind: "row", schema, time, values };
	}
}
