import { describe, expect, it } from "vitest";
import { ColumnarParseError } from "./errors";
import { ColumnarLineParser, parseDecimal } from "./lineParser";

const JAN_2_2020 = Date.UTC(2020, 0, 2);

const captureError = (fn: () => unknown): ColumnarParseError => {
	try {
		fn();
	} catch (error) {
		if (error instanceof ColumnarParseError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected a ColumnarParseError");
};

describe("ColumnarLineParser", () => {
	it("captures a trimmed, lower-cased schema from the first line", () => {
		const parser = new ColumnarLineParser();
		expect(parser.state).toEqual({ kind: "awaiting_header" });

		const parsed = parser.parse("Date, Open ,HIGH,Low Price");

		expect(parsed).toEqual({
			kind: "header",
			schema: ["date", "open", "high", "low price"],
		});
		expect(parser.schema).toEqual(["date", "open", "high", "low price"]);
		expect(parser.state.kind).toBe("parsing_rows");
	});

	it("treats every later line as a data row", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open,High");

		const parsed = parser.parse("2020-01-02,10,11.5");

		expect(parsed.kind).toBe("row");
		if (parsed.kind !== "row") return;
		expect(parsed.time).toBe(JAN_2_2020);
		expect(Array.from(parsed.values.entries())).toEqual([
			["open", 10],
			["high", 11.5],
		]);
	});

	it("never re-reads a header once rows are flowing", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open");
		parser.parse("2020-01-02,1");

		const error = captureError(() => parser.parse("Date,Open"));

		expect(error.code).toBe("MALFORMED_DATE");
		expect(parser.schema).toEqual(["date", "open"]);
	});

	it("parses rows shorter than the header positionally", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open,High,Close");

		const parsed = parser.parse("2020-01-02,7");

		if (parsed.kind !== "row") throw new Error("expected a row");
		expect(Array.from(parsed.values.keys())).toEqual(["open"]);
		expect(parsed.values.get("open")).toBe(7);
	});

	it("rejects rows longer than the header", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open");

		const error = captureError(() => parser.parse("2020-01-02,1,2"));

		expect(error.code).toBe("SCHEMA_MISMATCH");
		expect(error.message).toBe(
			"Row has 3 fields but the header declared 2 columns"
		);
		expect(error.line).toBe("2020-01-02,1,2");
	});

	it("rejects dates outside the YYYY-MM-DD format", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open");

		const error = captureError(() => parser.parse("01/02/2020,1"));

		expect(error.code).toBe("MALFORMED_DATE");
		expect(error.column).toBe(0);
		expect(error.message).toBe(
			'Malformed date "01/02/2020" in column 0, expected YYYY-MM-DD'
		);
		expect(error.cause).toBeInstanceOf(Error);
	});

	it("rejects impossible calendar dates", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open");

		expect(captureError(() => parser.parse("2021-02-29,1")).code).toBe(
			"MALFORMED_DATE"
		);
	});

	it("rejects non-numeric fields with the column they came from", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open,Close");

		const error = captureError(() => parser.parse("2020-01-02,abc,1"));

		expect(error.code).toBe("MALFORMED_NUMBER");
		expect(error.column).toBe(1);
		expect(error.message).toBe('Malformed number "abc" in column 1 (open)');
	});

	it("rejects blank numeric fields", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Open,Close");

		const error = captureError(() => parser.parse("2020-01-02,,1"));

		expect(error.code).toBe("MALFORMED_NUMBER");
		expect(error.column).toBe(1);
	});

	it("keeps parsing after a rejected row", () => {
		const parser = new ColumnarLineParser();
		parser.parse("Date,Close");
		captureError(() => parser.parse("bad,1"));

		const parsed = parser.parse("2020-01-03,2");

		if (parsed.kind !== "row") throw new Error("expected a row");
		expect(parsed.values.get("close")).toBe(2);
	});
});

describe("parseDecimal", () => {
	it("accepts plain, signed, fractional and exponent forms", () => {
		expect(parseDecimal("10")).toBe(10);
		expect(parseDecimal(" 2.5 ")).toBe(2.5);
		expect(parseDecimal("-.5")).toBe(-0.5);
		expect(parseDecimal("+3")).toBe(3);
		expect(parseDecimal("1.")).toBe(1);
		expect(parseDecimal("1e3")).toBe(1000);
		expect(parseDecimal("1000\r")).toBe(1000);
	});

	it("rejects everything else", () => {
		expect(parseDecimal("")).toBeNull();
		expect(parseDecimal("   ")).toBeNull();
		expect(parseDecimal("NaN")).toBeNull();
		expect(parseDecimal("Infinity")).toBeNull();
		expect(parseDecimal("0x10")).toBeNull();
		expect(parseDecimal("1e400")).toBeNull();
		expect(parseDecimal("12abc")).toBeNull();
	});
});
