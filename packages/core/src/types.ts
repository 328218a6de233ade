export type TimeframeUnit =
	| "second"
	| "minute"
	| "day"
	| "week"
	| "month"
	| "year";

export interface TimeframeSpec {
	unit: TimeframeUnit;
	multiplier: number;
}

/**
 * Bar exactly as the transport delivered it: UTC epoch ms, prices still in
 * the venue's raw units.
 */
export interface RawBar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Normalized bar handed to the host.
 *
 * `openTime` is exchange wall time for intraday timeframes and plain UTC for
 * daily and above. Within one feed it identifies the bar.
 */
export interface Bar {
	readonly openTime: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
	readonly isFinal: boolean;
}

/** Millisecond-of-day bounds; `null` leaves that side of the window open. */
export interface SessionWindow {
	start: number | null;
	end: number | null;
	allowFourPriceDoji: boolean;
}

export type SubscriptionHandle = string;

export interface Instrument {
	exchange: string;
	symbol: string;
}

export type FeedStatus =
	| "CONNECTING"
	| "DELAYED"
	| "CONNECTED"
	| "LIVE"
	| "DISCONNECTED";

export interface FeedNotification {
	feed: string;
	status: FeedStatus;
	at: number;
}

export type LoadResult =
	| { kind: "bar"; bar: Bar }
	| { kind: "pending" }
	| { kind: "end" };
