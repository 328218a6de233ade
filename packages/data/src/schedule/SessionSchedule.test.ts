import { describe, expect, it } from "vitest";
import { DAY_MS, MINUTE_MS } from "@barline/core";
import { SessionSchedule } from "./SessionSchedule";

const at = (day: number, hour: number, minute: number): number =>
	Date.UTC(2024, 2, day, hour, minute);

const clock = (hour: number, minute: number): number =>
	(hour * 60 + minute) * MINUTE_MS;

// 2024-03-04 is a Monday.
const moex = new SessionSchedule({
	timeZone: "Europe/Moscow",
	sessions: [
		{ start: clock(19, 5), end: clock(23, 50) },
		{ start: clock(10, 0), end: clock(18, 40) },
	],
	tradingDays: [1, 2, 3, 4, 5],
	safetyMarginMs: 5_000,
});

describe("SessionSchedule", () => {
	describe("nextBarOpen", () => {
		const fiveMinutes = 5 * MINUTE_MS;

		it("returns the bar forming inside a session", () => {
			expect(moex.nextBarOpen(at(4, 10, 7) + 30_000, fiveMinutes)).toBe(at(4, 10, 5));
		});

		it("aligns bars to the session start", () => {
			expect(moex.nextBarOpen(at(4, 19, 20), 10 * MINUTE_MS)).toBe(at(4, 19, 15));
		});

		it("waits for the first session of the day", () => {
			expect(moex.nextBarOpen(at(4, 8, 0), fiveMinutes)).toBe(at(4, 10, 0));
		});

		it("skips the break between sessions", () => {
			expect(moex.nextBarOpen(at(4, 18, 50), fiveMinutes)).toBe(at(4, 19, 5));
		});

		it("rolls over the weekend", () => {
			expect(moex.nextBarOpen(at(8, 23, 55), fiveMinutes)).toBe(at(11, 10, 0));
		});

		it("opens daily bars at midnight of a trading day", () => {
			expect(moex.nextBarOpen(at(4, 12, 0), DAY_MS)).toBe(at(4, 0, 0));
			expect(moex.nextBarOpen(at(4, 23, 55), DAY_MS)).toBe(at(5, 0, 0));
			expect(moex.nextBarOpen(at(9, 12, 0), DAY_MS)).toBe(at(11, 0, 0));
		});

		it("throws when no day trades", () => {
			const closed = new SessionSchedule({
				timeZone: "UTC",
				sessions: [{ start: 0, end: DAY_MS }],
				tradingDays: [],
				safetyMarginMs: 0,
			});
			expect(() => closed.nextBarOpen(at(4, 12, 0), fiveMinutes)).toThrowError(
				"No trading session within 14 days of 2024-03-04T12:00:00.000Z"
			);
		});
	});

	describe("requestTimeFor", () => {
		it("is the bar close inside a session", () => {
			expect(moex.requestTimeFor(at(4, 10, 0), 5 * MINUTE_MS)).toBe(at(4, 10, 5));
		});

		it("is cut at the session end", () => {
			expect(moex.requestTimeFor(at(4, 18, 35), 10 * MINUTE_MS)).toBe(at(4, 18, 40));
		});

		it("is the end of the last session for daily bars", () => {
			expect(moex.requestTimeFor(at(4, 0, 0), DAY_MS)).toBe(at(4, 23, 50));
		});
	});

	it("converts between UTC and Moscow wall time", () => {
		expect(moex.toExchangeTime(Date.UTC(2024, 2, 4, 7, 0))).toBe(at(4, 10, 0));
		expect(moex.toUtc(at(4, 10, 0))).toBe(Date.UTC(2024, 2, 4, 7, 0));
	});

	it("rejects an empty session list", () => {
		expect(
			() =>
				new SessionSchedule({
					timeZone: "UTC",
					sessions: [],
					tradingDays: [1],
					safetyMarginMs: 0,
				})
		).toThrowError("SessionSchedule needs at least one session");
	});
});
