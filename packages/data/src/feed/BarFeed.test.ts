import { describe, expect, it } from "vitest";
import { FAR_FUTURE_MS, silentLogger } from "@barline/core";
import { BarInbox } from "../inbox/BarInbox";
import { UNBOUNDED_SESSION } from "../session/sessionFilter";
import { FakeTransport, continuousCalendar, rawBar } from "../__tests__/fakes";
import { BarFeed } from "./BarFeed";
import type { BarFeedOptions } from "./BarFeed";

const minute = (m: number, s = 0): number => Date.UTC(2024, 2, 4, 10, m, s);
const NOW = minute(5, 30);

const createFeed = (
	overrides: Partial<BarFeedOptions> = {},
	transport = new FakeTransport(),
	now = NOW
) => {
	const inbox = new BarInbox(silentLogger, () => now);
	inbox.openInbox();
	const feed = new BarFeed(
		{
			name: "btc",
			dataname: "BINANCE:BTC/USDT",
			timeframe: { unit: "minute", multiplier: 1 },
			session: UNBOUNDED_SESSION,
			liveBars: false,
			...overrides,
		},
		{
			transport,
			inbox,
			providerName: "binance",
			logger: silentLogger,
			now: () => now,
		}
	);
	return { feed, inbox, transport };
};

const statuses = (feed: BarFeed): string[] =>
	feed.drainNotifications().map((notification) => notification.status);

describe("BarFeed", () => {
	describe("historical", () => {
		it("replays completed bars and ends with DISCONNECTED", async () => {
			const { feed, transport } = createFeed({ fromDate: minute(0) });
			transport.history = [
				rawBar(minute(0)),
				rawBar(minute(1)),
				rawBar(minute(2)),
				rawBar(minute(5)),
			];

			await feed.start();

			expect(transport.getHistory).toHaveBeenCalledWith({
				exchange: "BINANCE",
				symbol: "BTC/USDT",
				timeframe: { unit: "minute", multiplier: 1 },
				from: minute(0),
				to: FAR_FUTURE_MS,
			});
			expect(feed.drainNotifications()).toEqual([
				{ feed: "btc", status: "DELAYED", at: NOW },
				{ feed: "btc", status: "CONNECTED", at: NOW },
			]);

			const openTimes: number[] = [];
			for (;;) {
				const result = await feed.load();
				if (result.kind !== "bar") {
					expect(result.kind).toBe("end");
					break;
				}
				expect(result.bar.isFinal).toBe(true);
				openTimes.push(result.bar.openTime);
			}

			expect(openTimes).toEqual([minute(0), minute(1), minute(2)]);
			expect(statuses(feed)).toEqual(["DISCONNECTED"]);
			await expect(feed.load()).resolves.toEqual({ kind: "end" });
		});

		it("does not report CONNECTED when nothing survives the filter", async () => {
			const { feed, transport } = createFeed();
			transport.history = [rawBar(minute(5))];

			await feed.start();

			expect(statuses(feed)).toEqual(["DELAYED"]);
			await expect(feed.load()).resolves.toEqual({ kind: "end" });
		});

		it("converts intraday open times to exchange wall time", async () => {
			const { feed, transport } = createFeed(
				{
					dataname: "MOEX:SBER",
					session: {
						start: 36_000_000,
						end: 67_200_000,
						allowFourPriceDoji: true,
					},
				},
				new FakeTransport("Europe/Moscow")
			);
			transport.history = [rawBar(Date.UTC(2024, 2, 4, 7, 0))];

			await feed.start();
			const result = await feed.load();

			expect(result).toEqual({
				kind: "bar",
				bar: {
					openTime: Date.UTC(2024, 2, 4, 10, 0),
					open: 100,
					high: 101,
					low: 99,
					close: 100.5,
					volume: 10,
					isFinal: true,
				},
			});
		});

		it("runs prices through the transport", async () => {
			const { feed, transport } = createFeed();
			transport.rawPriceToPrice.mockImplementation(
				(_exchange, _symbol, raw) => raw / 100
			);
			transport.history = [
				rawBar(minute(0), { open: 1000, high: 1200, low: 900, close: 1100 }),
			];

			await feed.start();
			const result = await feed.load();

			expect(result.kind === "bar" && result.bar).toMatchObject({
				open: 10,
				high: 12,
				low: 9,
				close: 11,
				volume: 10,
			});
			expect(transport.rawPriceToPrice).toHaveBeenCalledWith("BINANCE", "BTC/USDT", 1000);
		});
	});

	describe("daily bars in an exchange time zone", () => {
		const moscowDaily = (now: number) => {
			const created = createFeed(
				{
					dataname: "MOEX:SBER",
					timeframe: { unit: "day", multiplier: 1 },
					session: { start: null, end: 67_500_000, allowFourPriceDoji: true },
				},
				new FakeTransport("Europe/Moscow"),
				now
			);
			created.transport.history = [rawBar(Date.UTC(2024, 2, 4))];
			return created;
		};

		it("releases the day's bar once the exchange session is over", async () => {
			// 16:00 UTC is 19:00 in Moscow, after the 18:45 session end.
			const { feed } = moscowDaily(Date.UTC(2024, 2, 4, 16, 0));

			await feed.start();
			const result = await feed.load();

			expect(result.kind === "bar" && result.bar).toMatchObject({
				openTime: Date.UTC(2024, 2, 4),
				isFinal: false,
			});
			expect(statuses(feed)).toEqual(["DELAYED", "CONNECTED"]);
		});

		it("holds the bar back while the exchange session is open", async () => {
			// 15:00 UTC is 18:00 in Moscow.
			const { feed } = moscowDaily(Date.UTC(2024, 2, 4, 15, 0));

			await feed.start();

			await expect(feed.load()).resolves.toEqual({ kind: "end" });
		});
	});

	describe("live", () => {
		it("subscribes and turns LIVE at the live edge", async () => {
			const { feed, inbox, transport } = createFeed({
				liveBars: true,
				fromDate: minute(3),
			});
			transport.exchangeTime = minute(5, 31);

			await feed.start();
			expect(transport.subscribeBars).toHaveBeenCalledWith(
				expect.objectContaining({ from: minute(3) })
			);
			expect(statuses(feed)).toEqual(["DELAYED", "CONNECTED"]);

			inbox.push("binance", "sub-1", rawBar(minute(3)));
			inbox.push("binance", "sub-1", rawBar(minute(4)));

			const first = await feed.load();
			expect(first.kind === "bar" && first.bar.openTime).toBe(minute(3));
			expect(statuses(feed)).toEqual([]);

			const second = await feed.load();
			expect(second.kind === "bar" && second.bar.openTime).toBe(minute(4));
			expect(transport.getExchangeTime).toHaveBeenCalledTimes(1);
			expect(statuses(feed)).toEqual(["LIVE"]);
			expect(feed.isLive()).toBe(true);

			await expect(feed.load()).resolves.toEqual({ kind: "pending" });
		});

		it("judges the live edge on the exchange clock in exchange time", async () => {
			const { feed, inbox, transport } = createFeed(
				{ dataname: "MOEX:SBER", liveBars: true },
				new FakeTransport("Europe/Moscow")
			);
			transport.exchangeTime = Date.UTC(2024, 2, 4, 7, 5, 1);
			await feed.start();

			inbox.push("binance", "sub-1", rawBar(Date.UTC(2024, 2, 4, 7, 4)));
			const result = await feed.load();

			expect(transport.getExchangeTime).toHaveBeenCalledTimes(1);
			expect(result.kind === "bar" && result.bar).toMatchObject({
				openTime: Date.UTC(2024, 2, 4, 10, 4),
				isFinal: true,
			});
		});

		it("clears its queued bars from the shared inbox on stop", async () => {
			const { feed, inbox } = createFeed({ liveBars: true });
			await feed.start();
			inbox.push("binance", "sub-1", rawBar(minute(3)));
			inbox.push("binance", "sub-1", rawBar(minute(4)));

			await feed.stop();

			expect(inbox.pending("binance", "sub-1")).toBe(0);
			expect(inbox.size).toBe(0);
		});

		it("ignores bars pushed under another provider", async () => {
			const { feed, inbox } = createFeed({ liveBars: true });
			await feed.start();

			inbox.push("other", "sub-1", rawBar(minute(4)));

			await expect(feed.load()).resolves.toEqual({ kind: "pending" });
			expect(inbox.size).toBe(1);
		});

		it("falls back to the local clock when the exchange clock fails", async () => {
			const { feed, inbox, transport } = createFeed({ liveBars: true });
			transport.getExchangeTime.mockRejectedValueOnce(new Error("timeout"));
			await feed.start();

			inbox.push("binance", "sub-1", rawBar(minute(4)));
			const result = await feed.load();

			expect(result.kind === "bar" && result.bar.openTime).toBe(minute(4));
		});

		it("polls on a schedule instead of subscribing", async () => {
			const { feed, transport } = createFeed({
				liveBars: true,
				schedule: continuousCalendar(),
			});

			await feed.start();
			await feed.stop();

			expect(transport.subscribeBars).not.toHaveBeenCalled();
			expect(statuses(feed)).toEqual(["DELAYED", "CONNECTED", "DISCONNECTED"]);
		});

		it("unsubscribes once on stop and ends afterwards", async () => {
			const { feed, transport } = createFeed({ liveBars: true });
			await feed.start();

			await feed.stop();
			await feed.stop();

			expect(transport.unsubscribe).toHaveBeenCalledTimes(1);
			expect(transport.unsubscribe).toHaveBeenCalledWith("sub-1");
			expect(statuses(feed)).toEqual(["DELAYED", "CONNECTED", "DISCONNECTED"]);
			await expect(feed.load()).resolves.toEqual({ kind: "end" });
		});
	});

	it("is pending before start", async () => {
		const { feed } = createFeed();
		await expect(feed.load()).resolves.toEqual({ kind: "pending" });
	});

	it("refuses to start twice", async () => {
		const { feed } = createFeed();
		await feed.start();
		await expect(feed.start()).rejects.toThrow("Feed btc already started");
	});
});
