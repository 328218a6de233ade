import type { OHLCV } from "ccxt";
import type { RawBar } from "@barline/core";

export const mapOhlcvRow = (row: OHLCV): RawBar => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};
