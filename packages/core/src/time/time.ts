/**
 * Pure time utilities for partition windowing.
 * All functions operate on UTC epoch milliseconds only.
 */
import { ConfigurationError, TimeframeParseError } from "../errors";
import {
	DAY_MS,
	HOUR_MS,
	MINUTE_MS,
	MONTHLY_WINDOW_MS,
	SECOND_MS,
} from "./constants";

const LABEL_UNITS: Record<string, number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a granularity label into milliseconds.
 * @param label - Format: "<int><unit>" with unit in s, m, h, d ("1m" is one minute)
 * @throws TimeframeParseError on an unknown unit or a non-integer quantity
 */
export const durationFromLabel = (label: string): number => {
	if (typeof label !== "string" || !label.trim()) {
		throw new TimeframeParseError(String(label), "expected a non-empty label");
	}

	const trimmed = label.trim();
	const match = trimmed.match(/^(.*?)([A-Za-z]+)$/);
	if (!match) {
		throw new TimeframeParseError(label, "missing unit");
	}

	const [, quantity, unit] = match;
	const unitMs = LABEL_UNITS[unit];
	if (unitMs === undefined) {
		throw new TimeframeParseError(
			label,
			`unknown unit "${unit}", expected one of s, m, h, d`
		);
	}
	if (!/^\d+$/.test(quantity)) {
		throw new TimeframeParseError(
			label,
			`quantity "${quantity}" is not an integer`
		);
	}

	const n = parseInt(quantity, 10);
	if (n <= 0) {
		throw new TimeframeParseError(label, "quantity must be positive");
	}
	return n * unitMs;
};

/**
 * Length of one partition file's window for a given sampling granularity.
 *
 * Both coarse tiers resolve to the 31-day window (see DESIGN.md).
 */
export const partitionWindowLength = (granularityMs: number): number => {
	if (granularityMs < HOUR_MS) {
		return DAY_MS;
	}
	if (granularityMs < DAY_MS) {
		return MONTHLY_WINDOW_MS;
	}
	return MONTHLY_WINDOW_MS;
};

/**
 * Floor an instant to the start of its enclosing partition period.
 * Sub-hourly granularities are returned unchanged.
 */
export const periodStart = (granularityMs: number, instantMs: number): number => {
	const date = new Date(instantMs);
	if (granularityMs >= DAY_MS) {
		return Date.UTC(date.getUTCFullYear(), 0, 1);
	}
	if (granularityMs >= HOUR_MS) {
		return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1);
	}
	return instantMs;
};

export const floorToUtcDay = (instantMs: number): number =>
	Math.floor(instantMs / DAY_MS) * DAY_MS;

/**
 * Every partition start covering [startMs, endMs) for a granularity, in
 * chronological order. Windows ending at or before `startMs` are left out.
 */
export const partitionStarts = (
	granularityMs: number,
	startMs: number,
	endMs: number
): number[] => {
	const windowMs = partitionWindowLength(granularityMs);
	const starts: number[] = [];
	let cursor = periodStart(granularityMs, floorToUtcDay(startMs));

	while (cursor < endMs) {
		if (cursor + windowMs > startMs) {
			starts.push(cursor);
		}
		const aligned = periodStart(granularityMs, cursor + windowMs);
		// the yearly tier floors back onto the same Jan 1 with a 31-day window
		cursor = aligned > cursor ? aligned : cursor + windowMs;
	}

	return starts;
};

/** UTC days touching [startMs, endMs). */
export const dailyPartitionStarts = (startMs: number, endMs: number): number[] => {
	const starts: number[] = [];
	for (let day = floorToUtcDay(startMs); day < endMs; day += DAY_MS) {
		starts.push(day);
	}
	return starts;
};

/**
 * How a series is cut into files: the window each file covers and the
 * window starts touching a range. Fetch and query both walk the timeline
 * through one of these.
 */
export interface PartitionLayout {
	readonly windowMs: number;
	starts(startMs: number, endMs: number): number[];
}

/** Candle layout, tiered by sampling granularity. */
export const granularityLayout = (granularityMs: number): PartitionLayout => ({
	windowMs: partitionWindowLength(granularityMs),
	starts: (startMs, endMs) => partitionStarts(granularityMs, startMs, endMs),
});

/** One file per UTC day, used for trades and funding. */
export const DAILY_LAYOUT: PartitionLayout = {
	windowMs: DAY_MS,
	starts: dailyPartitionStarts,
};

/**
 * True when `nowMs` falls inside [startMs, startMs + windowMs).
 */
export const windowContains = (
	startMs: number,
	windowMs: number,
	nowMs: number
): boolean => startMs <= nowMs && nowMs < startMs + windowMs;

export const formatPartitionDate = (instantMs: number): string =>
	new Date(instantMs).toISOString().slice(0, 10);

/**
 * Accepts "YYYY-MM-DD" (UTC midnight), any Date.parse-able timestamp, epoch
 * milliseconds or a Date.
 */
export const parseDateInput = (value: string | number | Date): number => {
	if (value instanceof Date) {
		const ts = value.getTime();
		if (Number.isNaN(ts)) {
			throw new ConfigurationError("Invalid date: Date object is not valid");
		}
		return ts;
	}
	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			throw new ConfigurationError(`Invalid date: ${value}`);
		}
		return value;
	}

	const trimmed = value.trim();
	const ts = DATE_ONLY_PATTERN.test(trimmed)
		? Date.parse(`${trimmed}T00:00:00Z`)
		: Date.parse(trimmed);
	if (Number.isNaN(ts)) {
		throw new ConfigurationError(
			`Invalid date "${value}", expected YYYY-MM-DD or an ISO timestamp`
		);
	}
	return ts;
};
