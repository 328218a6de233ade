/**
 * Conversions between UTC epoch ms and exchange wall time for an IANA zone.
 */

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
	let formatter = formatters.get(timeZone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone,
			hourCycle: "h23",
			year: "numeric",
			month: "2-digit",
			day: "2-digit",
			hour: "2-digit",
			minute: "2-digit",
			second: "2-digit",
		});
		formatters.set(timeZone, formatter);
	}
	return formatter;
};

const isUtc = (timeZone: string): boolean =>
	timeZone === "UTC" || timeZone === "Etc/UTC";

/**
 * @throws RangeError when the zone is unknown to the runtime
 */
export const assertTimeZone = (timeZone: string): void => {
	getFormatter(timeZone);
};

export const utcToExchangeTime = (utcMs: number, timeZone: string): number => {
	if (isUtc(timeZone)) {
		return utcMs;
	}
	const fields: Record<string, number> = {};
	for (const part of getFormatter(timeZone).formatToParts(new Date(utcMs))) {
		if (part.type !== "literal") {
			fields[part.type] = parseInt(part.value, 10);
		}
	}
	const millis = ((utcMs % 1_000) + 1_000) % 1_000;
	return (
		Date.UTC(
			fields.year,
			fields.month - 1,
			fields.day,
			fields.hour % 24,
			fields.minute,
			fields.second
		) + millis
	);
};

/**
 * Wall times inside a DST gap resolve to the later offset; ambiguous ones to
 * the first occurrence found.
 */
export const exchangeTimeToUtc = (wallMs: number, timeZone: string): number => {
	if (isUtc(timeZone)) {
		return wallMs;
	}
	const firstOffset = utcToExchangeTime(wallMs, timeZone) - wallMs;
	const guess = wallMs - firstOffset;
	const secondOffset = utcToExchangeTime(guess, timeZone) - guess;
	return secondOffset === firstOffset ? guess : wallMs - secondOffset;
};
