import { createLogger, formatTimeframe } from "@barline/core";
import type {
	Instrument,
	ModuleLogger,
	SubscriptionHandle,
	TimeframeSpec,
	TransportClient,
} from "@barline/core";
import type { BarSource } from "./types";

/**
 * Frequency hint far longer than any session. With it the upstream only
 * pushes a bar once it is complete, so the last bar of a session is
 * redelivered on the first tick of the next one.
 */
export const SESSION_ROLLOVER_FREQUENCY_MS = 1_000_000_000;

export interface PushBarSubscriberOptions {
	transport: TransportClient;
	instrument: Instrument;
	timeframe: TimeframeSpec;
	/** UTC epoch ms of the first bar wanted */
	from: number;
	logger?: ModuleLogger;
}

/**
 * Registers a push subscription. The transport delivers the bars into the
 * shared inbox itself; this class only owns the handle.
 */
export class PushBarSubscriber implements BarSource {
	readonly mode = "subscription";

	private readonly options: PushBarSubscriberOptions;
	private readonly logger: ModuleLogger;
	private currentHandle: SubscriptionHandle | null = null;

	constructor(options: PushBarSubscriberOptions) {
		this.options = options;
		this.logger = options.logger ?? createLogger("data:subscriber");
	}

	get handle(): SubscriptionHandle | null {
		return this.currentHandle;
	}

	async start(): Promise<SubscriptionHandle> {
		if (this.currentHandle) {
			throw new Error("PushBarSubscriber already subscribed");
		}

		const { transport, instrument, timeframe, from } = this.options;
		const handle = await transport.subscribeBars({
			...instrument,
			timeframe,
			from,
			frequencyMs: SESSION_ROLLOVER_FREQUENCY_MS,
		});
		this.currentHandle = handle;

		this.logger.info("subscription_started", {
			handle,
			exchange: instrument.exchange,
			symbol: instrument.symbol,
			timeframe: formatTimeframe(timeframe),
			from,
		});
		return handle;
	}

	async stop(): Promise<void> {
		const handle = this.currentHandle;
		if (!handle) {
			return;
		}
		this.currentHandle = null;
		await this.options.transport.unsubscribe(handle);
		this.logger.info("subscription_stopped", { handle });
	}
}
