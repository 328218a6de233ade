/**
 * Pure time utilities for bar timestamps.
 *
 * Exchange-local clock readings are carried as "wall time": epoch ms of the
 * local date/time read as if it were UTC, so the UTC getters return the
 * exchange's calendar fields directly.
 */
import { UnsupportedPeriodError } from "../errors";
import type { TimeframeSpec, TimeframeUnit } from "../types";
import { DAY_MS, MINUTE_MS, SECOND_MS, WEEK_MS } from "./constants";

const TIMEFRAME_PATTERN = /^(\d+)([smhdwMy])$/;

/**
 * Parse a compact timeframe string such as "5m" or "1d".
 * @param timeframe - "30s", "5m", "1h", "1d", "1w", "1M", "1y"
 * @throws Error if the format is invalid or the count is not positive
 */
export const parseTimeframe = (timeframe: string): TimeframeSpec => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "30s", "5m", "1h", "1d", "1w", "1M"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (match[2]) {
		case "s":
			return { unit: "second", multiplier: n };
		case "m":
			return { unit: "minute", multiplier: n };
		case "h":
			return { unit: "minute", multiplier: n * 60 };
		case "d":
			return { unit: "day", multiplier: n };
		case "w":
			return { unit: "week", multiplier: n };
		case "M":
			return { unit: "month", multiplier: n };
		default:
			return { unit: "year", multiplier: n };
	}
};

const UNIT_SUFFIX: Record<TimeframeUnit, string> = {
	second: "s",
	minute: "m",
	day: "d",
	week: "w",
	month: "M",
	year: "y",
};

/**
 * Inverse of parseTimeframe. Whole hours are written with "h".
 */
export const formatTimeframe = (spec: TimeframeSpec): string => {
	if (spec.unit === "minute" && spec.multiplier % 60 === 0) {
		return `${spec.multiplier / 60}h`;
	}
	return `${spec.multiplier}${UNIT_SUFFIX[spec.unit]}`;
};

export const isIntradayTimeframe = (spec: TimeframeSpec): boolean =>
	spec.unit === "second" || spec.unit === "minute";

/**
 * Fixed duration of one bar.
 * Days and weeks always step by one unit regardless of the multiplier.
 * @throws UnsupportedPeriodError for months and years
 */
export const timeframeToMs = (spec: TimeframeSpec): number => {
	switch (spec.unit) {
		case "second":
			return spec.multiplier * SECOND_MS;
		case "minute":
			return spec.multiplier * MINUTE_MS;
		case "day":
			return DAY_MS;
		case "week":
			return WEEK_MS;
		case "month":
		case "year":
			throw new UnsupportedPeriodError(spec.unit);
	}
};

/**
 * Close time of the bar opened at `openTime`, `period` bars ahead.
 *
 * Months land on day 1 of the target month at 00:00; years keep the date and
 * replace the year (29 Feb becomes 28 Feb in a common year).
 */
export const barCloseTime = (
	openTime: number,
	spec: TimeframeSpec,
	period = 1
): number => {
	switch (spec.unit) {
		case "day":
			return openTime + period * DAY_MS;
		case "week":
			return openTime + period * WEEK_MS;
		case "month": {
			const open = new Date(openTime);
			const monthIndex = open.getUTCMonth() + period;
			const year = open.getUTCFullYear() + Math.floor(monthIndex / 12);
			return Date.UTC(year, monthIndex % 12, 1);
		}
		case "year": {
			const open = new Date(openTime);
			const year = open.getUTCFullYear() + period;
			const month = open.getUTCMonth();
			const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
			const closed = new Date(openTime);
			closed.setUTCFullYear(year, month, Math.min(open.getUTCDate(), lastDay));
			return closed.getTime();
		}
		case "minute":
			return openTime + spec.multiplier * period * MINUTE_MS;
		case "second":
			return openTime + spec.multiplier * period * SECOND_MS;
	}
};

/** Milliseconds elapsed since 00:00 of the wall-time day. */
export const timeOfDay = (wallTime: number): number =>
	((wallTime % DAY_MS) + DAY_MS) % DAY_MS;

/** 00:00 of the wall-time day. */
export const startOfDay = (wallTime: number): number =>
	wallTime - timeOfDay(wallTime);

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse "HH:MM" or "HH:MM:SS" into milliseconds since midnight.
 * "24:00" is accepted as the end of the day.
 */
export const parseTimeOfDay = (value: string): number => {
	const match = value.trim().match(TIME_OF_DAY_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid time of day: "${value}". Expected "HH:MM" or "HH:MM:SS"`
		);
	}
	const hours = parseInt(match[1], 10);
	const minutes = parseInt(match[2], 10);
	const seconds = match[3] ? parseInt(match[3], 10) : 0;
	const total = ((hours * 60 + minutes) * 60 + seconds) * SECOND_MS;
	if (minutes > 59 || seconds > 59 || total > DAY_MS) {
		throw new Error(`Invalid time of day: "${value}" is out of range`);
	}
	return total;
};

export const formatTimeOfDay = (ms: number): string => {
	const totalSeconds = Math.floor(ms / SECOND_MS);
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	const pad = (value: number): string => value.toString().padStart(2, "0");
	return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
};
