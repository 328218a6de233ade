import { DAY_MS, barCloseTime, timeOfDay } from "@barline/core";
import type { Bar, SessionWindow, TimeframeSpec } from "@barline/core";

export type BarRejection =
	| "before_session_start"
	| "after_session_end"
	| "four_price_doji"
	| "still_forming";

export type BarVerdict =
	| { accepted: true; closeTime: number }
	| { accepted: false; reason: BarRejection; closeTime: number };

export interface SessionFilterInput {
	bar: Pick<Bar, "openTime" | "high" | "low">;
	session: SessionWindow;
	timeframe: TimeframeSpec;
	/**
	 * Exchange wall time to judge completeness against. Taken from the
	 * exchange clock at the live edge and from the local clock otherwise.
	 */
	exchangeNow: number;
}

/**
 * Check a bar against the session window. Rules run in order and the first
 * failure decides the reason.
 */
export const evaluateBar = ({
	bar,
	session,
	timeframe,
	exchangeNow,
}: SessionFilterInput): BarVerdict => {
	const closeTime = barCloseTime(bar.openTime, timeframe);

	if (session.start !== null && timeOfDay(bar.openTime) < session.start) {
		return { accepted: false, reason: "before_session_start", closeTime };
	}

	if (session.end !== null && timeOfDay(closeTime) > session.end) {
		return { accepted: false, reason: "after_session_end", closeTime };
	}

	if (!session.allowFourPriceDoji && bar.high === bar.low) {
		return { accepted: false, reason: "four_price_doji", closeTime };
	}

	// A bar that has not closed yet is only let through once the session is over.
	const sessionEnd = session.end ?? DAY_MS;
	if (closeTime > exchangeNow && timeOfDay(exchangeNow) < sessionEnd) {
		return { accepted: false, reason: "still_forming", closeTime };
	}

	return { accepted: true, closeTime };
};

export const isBarValid = (input: SessionFilterInput): boolean =>
	evaluateBar(input).accepted;

export const UNBOUNDED_SESSION: SessionWindow = {
	start: null,
	end: null,
	allowFourPriceDoji: true,
};
