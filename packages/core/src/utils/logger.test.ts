import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, sanitizeValue } from "./logger";

describe("sanitizeValue", () => {
	it("flattens errors, dates, bigints and maps", () => {
		const error = new Error("boom");
		expect(sanitizeValue(error, new WeakSet())).toEqual({
			name: "Error",
			message: "boom",
			stack: error.stack,
		});
		expect(sanitizeValue(new Date(Date.UTC(2020, 0, 2)), new WeakSet())).toBe(
			"2020-01-02T00:00:00.000Z"
		);
		expect(sanitizeValue(10n, new WeakSet())).toBe("10");
		expect(sanitizeValue(new Map([["close", 1.5]]), new WeakSet())).toEqual({
			close: 1.5,
		});
	});

	it("marks circular references", () => {
		const node: Record<string, unknown> = { name: "root" };
		node.self = node;
		expect(sanitizeValue(node, new WeakSet())).toEqual({
			name: "root",
			self: "[circular]",
		});
	});
});

describe("createLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes one JSON line per event with the module name", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

		createLogger("test-module").warn("test_event", { symbol: "TEST/SERIES" });

		expect(spy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
			ts: expect.any(String),
			level: "warn",
			event: "test_event",
			module: "test-module",
			symbol: "TEST/SERIES",
		});
	});

	it("writes to stderr when created with the stderr stream", () => {
		const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

		createLogger("test-module", { stream: "stderr" }).info("test_event");

		expect(stdout).not.toHaveBeenCalled();
		expect(stderr).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(stderr.mock.calls[0][0]))).toEqual({
			ts: expect.any(String),
			level: "info",
			event: "test_event",
			module: "test-module",
		});
	});
});
