import {
	FAR_FUTURE_MS,
	barCloseTime,
	createLogger,
	errorMessage,
	formatTimeframe,
	isIntradayTimeframe,
	utcToExchangeTime,
} from "@barline/core";
import type {
	Bar,
	ExchangeCalendar,
	FeedNotification,
	FeedStatus,
	Instrument,
	LoadResult,
	ModuleLogger,
	RawBar,
	SessionWindow,
	TimeframeSpec,
	TransportClient,
} from "@barline/core";
import type { BarInbox } from "../inbox/BarInbox";
import { NotificationQueue } from "../notifications/NotificationQueue";
import { BarReconciler } from "../reconcile/BarReconciler";
import type { ReconcilerStats } from "../reconcile/BarReconciler";
import { isBarValid } from "../session/sessionFilter";
import { PushBarSubscriber } from "../sources/PushBarSubscriber";
import { ScheduledBarPoller } from "../sources/ScheduledBarPoller";
import type { BarSource } from "../sources/types";

export interface BarFeedOptions {
	name: string;
	/** e.g. "BINANCE:BTC/USDT" */
	dataname: string;
	/** Defaults to the first provider registered with the store */
	providerName?: string;
	timeframe: TimeframeSpec;
	session: SessionWindow;
	/** UTC epoch ms */
	fromDate?: number;
	/** UTC epoch ms */
	toDate?: number;
	liveBars: boolean;
	/** Poll on this calendar instead of subscribing */
	schedule?: ExchangeCalendar;
}

export interface BarFeedContext {
	transport: TransportClient;
	inbox: BarInbox;
	providerName: string;
	logger?: ModuleLogger;
	now?: () => number;
}

/**
 * One instrument/timeframe stream handed to the host.
 *
 * Historical feeds prefetch the whole range on start and replay it; live feeds
 * start a poller or push subscription and reconcile the inbox one entry per
 * load().
 */
export class BarFeed {
	readonly name: string;
	readonly providerName: string;
	readonly instrument: Instrument;

	private readonly options: BarFeedOptions;
	private readonly transport: TransportClient;
	private readonly inbox: BarInbox;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly notifications = new NotificationQueue<FeedNotification>();
	private readonly reconciler: BarReconciler;
	private source: BarSource | null = null;
	private started = false;
	private stopped = false;
	private lastStatus: FeedStatus | null = null;

	constructor(options: BarFeedOptions, context: BarFeedContext) {
		this.options = options;
		this.name = options.name;
		this.providerName = context.providerName;
		this.transport = context.transport;
		this.inbox = context.inbox;
		this.logger = context.logger ?? createLogger("data:feed");
		this.now = context.now ?? Date.now;
		this.instrument = context.transport.resolveInstrument(options.dataname);

		this.reconciler = new BarReconciler({
			mode: options.liveBars ? "live" : "historical",
			inbox: context.inbox,
			providerName: context.providerName,
			session: options.session,
			timeframe: options.timeframe,
			normalize: (raw, exchangeNow) => this.normalize(raw, exchangeNow),
			clock: (atLiveEdge) => this.exchangeNow(atLiveEdge),
			notify: (status) => this.notify(status),
			logger: this.logger,
		});
	}

	isLive(): boolean {
		return this.options.liveBars;
	}

	get reconcilerStats(): ReconcilerStats {
		return this.reconciler.getStats();
	}

	/**
	 * @throws UnsupportedPeriodError when a scheduled feed uses a month or year
	 * timeframe
	 */
	async start(): Promise<void> {
		if (this.started) {
			throw new Error(`Feed ${this.name} already started`);
		}
		if (this.stopped) {
			throw new Error(`Feed ${this.name} was stopped`);
		}
		this.started = true;
		this.notify("DELAYED");

		if (this.options.liveBars) {
			await this.startLive();
		} else {
			await this.prefetchHistory();
		}
	}

	/** Advance the feed by one reconciler step. */
	async load(): Promise<LoadResult> {
		if (!this.started || this.stopped) {
			return this.stopped ? { kind: "end" } : { kind: "pending" };
		}
		return this.reconciler.poll();
	}

	async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;

		const source = this.source;
		this.source = null;
		if (source) {
			const handle = source.handle;
			try {
				await source.stop();
			} catch (error) {
				this.logger.error("feed_source_stop_failed", {
					feed: this.name,
					message: errorMessage(error),
				});
			}
			if (handle) {
				this.inbox.discard(this.providerName, handle);
			}
		}
		if (this.lastStatus !== "DISCONNECTED") {
			this.notify("DISCONNECTED");
		}
		this.logger.info("feed_stopped", {
			feed: this.name,
			...this.reconciler.getStats(),
		});
	}

	drainNotifications(): FeedNotification[] {
		return this.notifications.drain();
	}

	private async prefetchHistory(): Promise<void> {
		const { timeframe, session, fromDate, toDate } = this.options;
		const from = fromDate ?? 0;
		const to = toDate ?? FAR_FUTURE_MS;

		const raws = await this.transport.getHistory({
			...this.instrument,
			timeframe,
			from,
			to,
		});
		const exchangeNow = await this.exchangeNow(false);
		const bars = raws
			.map((raw) => this.normalize(raw, exchangeNow))
			.filter((bar) => isBarValid({ bar, session, timeframe, exchangeNow }));
		this.reconciler.loadHistory(bars);

		this.logger.info("feed_history_loaded", {
			feed: this.name,
			timeframe: formatTimeframe(timeframe),
			from,
			to,
			received: raws.length,
			kept: bars.length,
		});
		if (bars.length > 0) {
			this.notify("CONNECTED");
		}
	}

	private async startLive(): Promise<void> {
		const { timeframe, schedule, fromDate } = this.options;
		this.source = schedule
			? new ScheduledBarPoller({
					transport: this.transport,
					calendar: schedule,
					inbox: this.inbox,
					providerName: this.providerName,
					instrument: this.instrument,
					timeframe,
					logger: this.logger,
					now: this.now,
				})
			: new PushBarSubscriber({
					transport: this.transport,
					instrument: this.instrument,
					timeframe,
					from: fromDate ?? this.now(),
					logger: this.logger,
				});

		const handle = await this.source.start();
		this.reconciler.attach(handle);
		this.logger.info("feed_live", {
			feed: this.name,
			mode: this.source.mode,
			handle,
		});
		this.notify("CONNECTED");
	}

	private normalize(raw: RawBar, exchangeNow: number): Bar {
		const { timeframe } = this.options;
		const { exchange, symbol } = this.instrument;
		const openTime = isIntradayTimeframe(timeframe)
			? utcToExchangeTime(raw.timestamp, this.transport.timeZone)
			: raw.timestamp;
		const price = (value: number): number =>
			this.transport.rawPriceToPrice(exchange, symbol, value);

		return {
			openTime,
			open: price(raw.open),
			high: price(raw.high),
			low: price(raw.low),
			close: price(raw.close),
			volume: raw.volume,
			isFinal: barCloseTime(openTime, timeframe) <= exchangeNow,
		};
	}

	/** Exchange wall time now, for every timeframe. */
	private async exchangeNow(atLiveEdge: boolean): Promise<number> {
		let utcNow = this.now();
		if (atLiveEdge) {
			try {
				utcNow = await this.transport.getExchangeTime();
			} catch (error) {
				this.logger.warn("exchange_clock_unavailable", {
					feed: this.name,
					message: errorMessage(error),
				});
			}
		}
		return utcToExchangeTime(utcNow, this.transport.timeZone);
	}

	private notify(status: FeedStatus): void {
		this.lastStatus = status;
		this.notifications.push({ feed: this.name, status, at: this.now() });
		this.logger.debug("feed_status", { feed: this.name, status });
	}
}
