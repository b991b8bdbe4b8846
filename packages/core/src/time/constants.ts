/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Partition window used for hourly-and-coarser granularities.
 */
export const MONTHLY_WINDOW_MS = 31 * DAY_MS;
