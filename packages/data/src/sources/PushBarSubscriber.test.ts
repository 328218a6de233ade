import { describe, expect, it } from "vitest";
import { silentLogger } from "@barline/core";
import { FakeTransport } from "../__tests__/fakes";
import {
	PushBarSubscriber,
	SESSION_ROLLOVER_FREQUENCY_MS,
} from "./PushBarSubscriber";

const createSubscriber = (transport: FakeTransport): PushBarSubscriber =>
	new PushBarSubscriber({
		transport,
		instrument: { exchange: "MOEX", symbol: "SBER" },
		timeframe: { unit: "minute", multiplier: 5 },
		from: Date.UTC(2024, 2, 1),
		logger: silentLogger,
	});

describe("PushBarSubscriber", () => {
	it("subscribes with the session rollover frequency and keeps the handle", async () => {
		const transport = new FakeTransport();
		const subscriber = createSubscriber(transport);

		await expect(subscriber.start()).resolves.toBe("sub-1");

		expect(subscriber.handle).toBe("sub-1");
		expect(transport.subscribeBars).toHaveBeenCalledWith({
			exchange: "MOEX",
			symbol: "SBER",
			timeframe: { unit: "minute", multiplier: 5 },
			from: Date.UTC(2024, 2, 1),
			frequencyMs: SESSION_ROLLOVER_FREQUENCY_MS,
		});
		expect(SESSION_ROLLOVER_FREQUENCY_MS).toBe(1_000_000_000);
	});

	it("unsubscribes its own handle once", async () => {
		const transport = new FakeTransport();
		const subscriber = createSubscriber(transport);
		await subscriber.start();

		await subscriber.stop();
		await subscriber.stop();

		expect(transport.unsubscribe).toHaveBeenCalledTimes(1);
		expect(transport.unsubscribe).toHaveBeenCalledWith("sub-1");
		expect(subscriber.handle).toBeNull();
	});

	it("refuses to subscribe twice", async () => {
		const transport = new FakeTransport();
		const subscriber = createSubscriber(transport);
		await subscriber.start();

		await expect(subscriber.start()).rejects.toThrow(
			"PushBarSubscriber already subscribed"
		);
		expect(transport.subscribeBars).toHaveBeenCalledTimes(1);
	});

	it("does nothing on stop when never started", async () => {
		const transport = new FakeTransport();
		await createSubscriber(transport).stop();
		expect(transport.unsubscribe).not.toHaveBeenCalled();
	});
});
