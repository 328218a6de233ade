import { createLogger } from "@barline/core";
import type {
	Bar,
	FeedStatus,
	LoadResult,
	ModuleLogger,
	RawBar,
	SessionWindow,
	SubscriptionHandle,
	TimeframeSpec,
} from "@barline/core";
import type { BarInbox } from "../inbox/BarInbox";
import { evaluateBar } from "../session/sessionFilter";
import type { BarRejection } from "../session/sessionFilter";

export type ReconcilerMode = "historical" | "live";

/**
 * Turns a raw bar into a host bar given the exchange time it is judged at.
 */
export type BarNormalizer = (raw: RawBar, exchangeNow: number) => Bar;

/**
 * Exchange wall time. `atLiveEdge` selects the exchange's own clock over the
 * local one.
 */
export type ExchangeClock = (atLiveEdge: boolean) => Promise<number>;

export interface BarReconcilerOptions {
	mode: ReconcilerMode;
	inbox: BarInbox;
	providerName: string;
	session: SessionWindow;
	timeframe: TimeframeSpec;
	normalize: BarNormalizer;
	clock: ExchangeClock;
	notify: (status: FeedStatus) => void;
	logger?: ModuleLogger;
}

export interface ReconcilerState {
	lastOpenTime: number;
	liveMode: boolean;
	lastBarReceived: boolean;
}

export interface ReconcilerStats extends ReconcilerState {
	emitted: number;
	rejected: Record<BarRejection, number>;
	outOfOrder: number;
}

/**
 * Sequencing state machine behind one feed.
 *
 * Historical mode replays a prefetched list. Live mode claims one inbox entry
 * per call, filters it, drops anything not newer than the last emitted bar and
 * flips between DELAYED and LIVE as the live edge is reached or lost.
 */
export class BarReconciler {
	private readonly options: BarReconcilerOptions;
	private readonly logger: ModuleLogger;
	private readonly history: Bar[] = [];
	private handle: SubscriptionHandle | null = null;
	private exhausted = false;

	private lastOpenTime = Number.NEGATIVE_INFINITY;
	private liveMode = false;
	private lastBarReceived = false;

	private emitted = 0;
	private outOfOrder = 0;
	private readonly rejected: Record<BarRejection, number> = {
		before_session_start: 0,
		after_session_end: 0,
		four_price_doji: 0,
		still_forming: 0,
	};

	constructor(options: BarReconcilerOptions) {
		this.options = options;
		this.logger = options.logger ?? createLogger("data:reconciler");
	}

	get mode(): ReconcilerMode {
		return this.options.mode;
	}

	get state(): ReconcilerState {
		return {
			lastOpenTime: this.lastOpenTime,
			liveMode: this.liveMode,
			lastBarReceived: this.lastBarReceived,
		};
	}

	getStats(): ReconcilerStats {
		return {
			...this.state,
			emitted: this.emitted,
			rejected: { ...this.rejected },
			outOfOrder: this.outOfOrder,
		};
	}

	/**
	 * Replace the replay list of a historical reconciler. Bars are ordered by
	 * open time and the first bar of each open time wins.
	 */
	loadHistory(bars: Bar[]): void {
		if (this.options.mode !== "historical") {
			throw new Error("Only a historical reconciler replays prefetched bars");
		}
		const ordered = [...bars].sort((a, b) => a.openTime - b.openTime);
		const seen = new Set<number>();
		this.history.length = 0;
		for (const bar of ordered) {
			if (!seen.has(bar.openTime)) {
				seen.add(bar.openTime);
				this.history.push(bar);
			}
		}
		this.exhausted = false;
	}

	/** Bind a live reconciler to the handle its bars arrive under. */
	attach(handle: SubscriptionHandle): void {
		if (this.options.mode !== "live") {
			throw new Error("Only a live reconciler reads from the inbox");
		}
		this.handle = handle;
	}

	async poll(): Promise<LoadResult> {
		return this.options.mode === "historical"
			? this.pollHistory()
			: this.pollLive();
	}

	private pollHistory(): LoadResult {
		if (this.exhausted) {
			return { kind: "end" };
		}

		const bar = this.history.shift();
		if (!bar) {
			this.exhausted = true;
			this.options.notify("DISCONNECTED");
			return { kind: "end" };
		}

		this.lastOpenTime = bar.openTime;
		this.emitted += 1;
		return { kind: "bar", bar };
	}

	private async pollLive(): Promise<LoadResult> {
		const { inbox, providerName } = this.options;
		if (!this.handle) {
			return { kind: "pending" };
		}

		const claim = inbox.claim(providerName, this.handle);
		if (!claim) {
			return { kind: "pending" };
		}

		// Nothing else waiting for this handle means we are at the live edge.
		this.lastBarReceived = claim.matched === 1;

		const exchangeNow = await this.options.clock(this.lastBarReceived);
		const bar = this.options.normalize(claim.entry.bar, exchangeNow);
		const verdict = evaluateBar({
			bar,
			session: this.options.session,
			timeframe: this.options.timeframe,
			exchangeNow,
		});
		if (!verdict.accepted) {
			this.rejected[verdict.reason] += 1;
			this.logger.debug("bar_rejected", {
				handle: this.handle,
				openTime: bar.openTime,
				reason: verdict.reason,
			});
			return { kind: "pending" };
		}

		if (bar.openTime <= this.lastOpenTime) {
			this.outOfOrder += 1;
			this.logger.debug("bar_out_of_order", {
				handle: this.handle,
				openTime: bar.openTime,
				lastOpenTime: this.lastOpenTime,
			});
			return { kind: "pending" };
		}
		this.lastOpenTime = bar.openTime;

		if (this.lastBarReceived && !this.liveMode) {
			this.liveMode = true;
			this.options.notify("LIVE");
		} else if (this.liveMode && !this.lastBarReceived) {
			// Catch-up after the exchange's maintenance window.
			this.liveMode = false;
			this.options.notify("DELAYED");
		}

		this.emitted += 1;
		return { kind: "bar", bar };
	}
}
