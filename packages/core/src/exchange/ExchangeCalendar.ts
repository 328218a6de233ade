/**
 * Trading calendar of one exchange. All instants except the UTC conversions
 * are exchange wall time.
 */
export interface ExchangeCalendar {
	readonly timeZone: string;

	/** Extra wait after the request time before the bar is fetched */
	readonly safetyMarginMs: number;

	/**
	 * Open time of the bar that the next scheduled fetch should return:
	 * the bar forming at `now`, or the first bar of the next session.
	 */
	nextBarOpen(now: number, periodMs: number): number;

	/** Earliest moment the bar opened at `barOpen` can be requested complete */
	requestTimeFor(barOpen: number, periodMs: number): number;

	toExchangeTime(utcMs: number): number;

	toUtc(wallMs: number): number;
}
