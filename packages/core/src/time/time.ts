/**
 * Pure calendar-date utilities.
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a strict `YYYY-MM-DD` date into the epoch milliseconds of its UTC midnight
 * @throws Error if the value is not in that exact format or is not a real date
 */
export const parseCalendarDate = (value: string): number => {
	if (typeof value !== "string") {
		throw new Error(
			`Invalid calendar date: expected string, got ${typeof value}`
		);
	}

	const match = value.match(CALENDAR_DATE_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid calendar date format: "${value}". Expected format like "2020-01-02"`
		);
	}

	const year = parseInt(match[1], 10);
	const month = parseInt(match[2], 10);
	const day = parseInt(match[3], 10);
	const ts = Date.UTC(year, month - 1, day);
	const check = new Date(ts);

	// Date.UTC rolls 2021-02-30 over into March
	if (
		check.getUTCFullYear() !== year ||
		check.getUTCMonth() !== month - 1 ||
		check.getUTCDate() !== day
	) {
		throw new Error(`Invalid calendar date: "${value}" does not exist`);
	}

	return ts;
};

/**
 * Format epoch milliseconds as the `YYYY-MM-DD` of its UTC day
 */
export const formatCalendarDate = (ts: number): string => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	return new Date(ts).toISOString().slice(0, 10);
};
