import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { abortableDelay } from "./abortableDelay";

describe("abortableDelay", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves false once the delay elapses", async () => {
		const controller = new AbortController();
		const pending = abortableDelay(1_000, controller.signal);
		await vi.advanceTimersByTimeAsync(1_000);
		await expect(pending).resolves.toBe(false);
	});

	it("resolves true as soon as the signal aborts", async () => {
		const controller = new AbortController();
		const pending = abortableDelay(60_000, controller.signal);
		await vi.advanceTimersByTimeAsync(10);
		controller.abort();
		await expect(pending).resolves.toBe(true);
		expect(vi.getTimerCount()).toBe(0);
	});

	it("resolves true immediately for an already aborted signal", async () => {
		const controller = new AbortController();
		controller.abort();
		await expect(abortableDelay(5_000, controller.signal)).resolves.toBe(true);
	});

	it("treats negative delays as zero", async () => {
		const controller = new AbortController();
		const pending = abortableDelay(-500, controller.signal);
		await vi.advanceTimersByTimeAsync(0);
		await expect(pending).resolves.toBe(false);
	});
});
