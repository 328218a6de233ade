import type { RawBar } from "@barline/core";

export interface KlineUpdate {
	bar: RawBar;
	closed: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Read a kline event from a combined-stream frame
 * (`{"stream": "...", "data": {"e": "kline", "k": {...}}}`) or a bare one.
 * Anything else yields null.
 *
 * @throws SyntaxError when the frame is not JSON
 */
export const parseKlineMessage = (raw: string): KlineUpdate | null => {
	const payload: unknown = JSON.parse(raw);
	if (!isRecord(payload)) {
		return null;
	}
	const event = isRecord(payload.data) ? payload.data : payload;
	const kline = event.k;
	if (!isRecord(kline)) {
		return null;
	}

	const timestamp = Number(kline.t);
	if (!Number.isFinite(timestamp)) {
		return null;
	}

	return {
		bar: {
			timestamp,
			open: Number(kline.o ?? 0),
			high: Number(kline.h ?? 0),
			low: Number(kline.l ?? 0),
			close: Number(kline.c ?? 0),
			volume: Number(kline.v ?? 0),
		},
		closed: kline.x === true,
	};
};
