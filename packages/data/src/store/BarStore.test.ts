import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "@barline/core";
import { FakeTransport, rawBar } from "../__tests__/fakes";
import { BarFeed } from "../feed/BarFeed";
import type { BarFeedOptions } from "../feed/BarFeed";
import { UNBOUNDED_SESSION } from "../session/sessionFilter";
import { BarStore, createBarFeed } from "./BarStore";

const NOW = Date.UTC(2024, 2, 4, 10, 5, 30);

const feedOptions: BarFeedOptions = {
	name: "btc",
	dataname: "BINANCE:BTC/USDT",
	timeframe: { unit: "minute", multiplier: 1 },
	session: UNBOUNDED_SESSION,
	liveBars: true,
};

const createStore = () => {
	const binance = new FakeTransport();
	const moex = new FakeTransport("Europe/Moscow");
	const store = new BarStore({
		providers: { binance, moex },
		logger: silentLogger,
		now: () => NOW,
	});
	return { store, binance, moex };
};

describe("BarStore", () => {
	it("routes pushed bars into the inbox tagged with the provider", () => {
		const { store, binance, moex } = createStore();
		store.start();

		binance.emit("sub-1", rawBar(1));
		moex.emit("sub-1", rawBar(2));

		expect(store.inbox.pending("binance", "sub-1")).toBe(1);
		expect(store.inbox.pending("moex", "sub-1")).toBe(1);
	});

	it("creates feeds on the first provider by default", () => {
		const feedFactory = vi.fn(createBarFeed);
		const binance = new FakeTransport();
		const store = new BarStore({
			providers: { binance, other: new FakeTransport() },
			feedFactory,
			logger: silentLogger,
		});

		const feed = store.createFeed(feedOptions);

		expect(feed).toBeInstanceOf(BarFeed);
		expect(feed.providerName).toBe("binance");
		expect(feedFactory).toHaveBeenCalledWith(
			feedOptions,
			expect.objectContaining({
				transport: binance,
				inbox: store.inbox,
				providerName: "binance",
			})
		);
	});

	it("creates feeds on a named provider", () => {
		const { store } = createStore();
		const feed = store.createFeed({ ...feedOptions, providerName: "moex" });
		expect(feed.providerName).toBe("moex");
	});

	it("rejects an unknown provider", () => {
		const { store } = createStore();
		expect(() =>
			store.createFeed({ ...feedOptions, providerName: "kraken" })
		).toThrowError('Unknown provider "kraken". Registered: binance, moex');
	});

	it("refuses to start twice", () => {
		const { store } = createStore();
		store.start();
		expect(() => store.start()).toThrowError("BarStore already started");
	});

	it("stops feeds, detaches listeners and closes transports", async () => {
		const { store, binance, moex } = createStore();
		store.start();
		const feed = store.createFeed(feedOptions);
		await feed.start();

		await store.stop();

		expect(binance.unsubscribe).toHaveBeenCalledWith("sub-1");
		expect(binance.listenerCount).toBe(0);
		expect(moex.listenerCount).toBe(0);
		expect(binance.close).toHaveBeenCalledTimes(1);
		expect(moex.close).toHaveBeenCalledTimes(1);
		expect(store.inbox.isOpen).toBe(false);
		expect(feed.drainNotifications().at(-1)?.status).toBe("DISCONNECTED");
	});

	it("drops pushes and refuses new feeds after stop", async () => {
		const { store } = createStore();
		store.start();
		await store.stop();

		expect(store.inbox.push("binance", "sub-1", rawBar(1))).toBe(false);
		expect(() => store.createFeed(feedOptions)).toThrowError(
			"Cannot create a feed on a stopped BarStore"
		);
	});

	it("keeps stopping when a transport fails to close", async () => {
		const { store, binance, moex } = createStore();
		binance.close.mockRejectedValueOnce(new Error("socket gone"));
		store.start();

		await store.stop();

		expect(moex.close).toHaveBeenCalledTimes(1);
		expect(store.inbox.isOpen).toBe(false);
	});

	it("queues store notifications", () => {
		const { store } = createStore();
		store.start();
		store.putNotification("custom", { reason: "test" });

		expect(store.getNotifications()).toEqual([
			{
				message: "store_started",
				at: NOW,
				data: { providers: ["binance", "moex"] },
			},
			{ message: "custom", at: NOW, data: { reason: "test" } },
		]);
		expect(store.getNotifications()).toEqual([]);
	});
});
