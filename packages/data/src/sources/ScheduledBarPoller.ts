import { randomUUID } from "node:crypto";
import {
	abortableDelay,
	createLogger,
	errorMessage,
	formatTimeframe,
	timeframeToMs,
} from "@barline/core";
import type {
	ExchangeCalendar,
	Instrument,
	ModuleLogger,
	RawBar,
	SubscriptionHandle,
	TimeframeSpec,
	TransportClient,
} from "@barline/core";
import type { BarInbox } from "../inbox/BarInbox";
import type { BarSource } from "./types";

export interface ScheduledBarPollerOptions {
	transport: TransportClient;
	calendar: ExchangeCalendar;
	inbox: BarInbox;
	providerName: string;
	instrument: Instrument;
	timeframe: TimeframeSpec;
	logger?: ModuleLogger;
	now?: () => number;
}

/**
 * Fetches each bar once the exchange calendar says it is complete.
 *
 * The loop sleeps until the request time of the bar forming now (plus the
 * calendar's safety margin), asks the transport for history from that bar's
 * open and pushes the first bar returned into the inbox.
 */
export class ScheduledBarPoller implements BarSource {
	readonly mode = "schedule";

	private readonly options: ScheduledBarPollerOptions;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private controller: AbortController | null = null;
	private task: Promise<void> | null = null;
	private currentHandle: SubscriptionHandle | null = null;
	private fetches = 0;
	private looping = false;

	constructor(options: ScheduledBarPollerOptions) {
		this.options = options;
		this.logger = options.logger ?? createLogger("data:poller");
		this.now = options.now ?? Date.now;
	}

	get handle(): SubscriptionHandle | null {
		return this.currentHandle;
	}

	/** False once the loop has exited, whether stopped or given up. */
	get isRunning(): boolean {
		return this.looping;
	}

	get fetchCount(): number {
		return this.fetches;
	}

	/**
	 * @throws UnsupportedPeriodError for month and year timeframes
	 */
	async start(): Promise<SubscriptionHandle> {
		if (this.task) {
			throw new Error("ScheduledBarPoller already running");
		}

		const periodMs = timeframeToMs(this.options.timeframe);
		const handle = randomUUID();
		const controller = new AbortController();

		this.currentHandle = handle;
		this.controller = controller;
		this.task = this.run(handle, periodMs, controller.signal);

		this.logger.info("poller_started", {
			handle,
			exchange: this.options.instrument.exchange,
			symbol: this.options.instrument.symbol,
			timeframe: formatTimeframe(this.options.timeframe),
		});
		return handle;
	}

	/** Resolves once the loop has exited. */
	async stop(): Promise<void> {
		const task = this.task;
		if (!task || !this.controller) {
			return;
		}

		this.controller.abort();
		try {
			await task;
		} finally {
			this.task = null;
			this.controller = null;
			this.logger.info("poller_stopped", {
				handle: this.currentHandle,
				fetches: this.fetches,
			});
		}
	}

	private async run(
		handle: SubscriptionHandle,
		periodMs: number,
		signal: AbortSignal
	): Promise<void> {
		this.looping = true;
		try {
			while (!signal.aborted) {
				const slot = this.nextSlot(handle, periodMs);
				if (!slot) {
					return;
				}

				if (await abortableDelay(slot.waitMs, signal)) {
					return;
				}

				const bar = await this.fetchBar(handle, slot.from);
				if (!bar || signal.aborted) {
					continue;
				}
				this.options.inbox.push(this.options.providerName, handle, bar);
			}
		} finally {
			this.looping = false;
		}
	}

	/**
	 * Wait and request start for the next bar, or null when the calendar
	 * cannot place one. The loop ends in that case; the feed stalls instead of
	 * failing the host.
	 */
	private nextSlot(
		handle: SubscriptionHandle,
		periodMs: number
	): { waitMs: number; from: number } | null {
		const { calendar } = this.options;
		try {
			const now = calendar.toExchangeTime(this.now());
			const barOpen = calendar.nextBarOpen(now, periodMs);
			const requestAt = calendar.requestTimeFor(barOpen, periodMs);
			const waitMs = requestAt - now + calendar.safetyMarginMs;

			this.logger.debug("poller_waiting", {
				handle,
				barOpen,
				requestAt,
				waitMs,
			});
			return { waitMs, from: calendar.toUtc(barOpen) };
		} catch (error) {
			this.logger.error("poller_schedule_failed", {
				handle,
				message: errorMessage(error),
			});
			return null;
		}
	}

	private async fetchBar(
		handle: SubscriptionHandle,
		from: number
	): Promise<RawBar | null> {
		const { transport, instrument, timeframe } = this.options;
		this.fetches += 1;
		try {
			const bars = await transport.getHistory({
				...instrument,
				timeframe,
				from,
			});
			if (bars.length === 0) {
				this.logger.debug("poller_empty_fetch", { handle, from });
				return null;
			}
			return bars[0];
		} catch (error) {
			this.logger.warn("poller_fetch_failed", {
				handle,
				from,
				message: errorMessage(error),
			});
			return null;
		}
	}
}
