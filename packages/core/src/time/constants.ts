/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

const SECOND_MS = 1_000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Span covered by a single daily record
 */
export const ONE_DAY_MS = 24 * HOUR_MS;
