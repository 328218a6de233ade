import type {
	Instrument,
	RawBar,
	SubscriptionHandle,
	TimeframeSpec,
} from "../types";

export interface HistoryRequest extends Instrument {
	timeframe: TimeframeSpec;
	/** UTC epoch ms, inclusive */
	from: number;
	/** UTC epoch ms, inclusive; open-ended when omitted */
	to?: number;
}

export interface BarSubscriptionRequest extends Instrument {
	timeframe: TimeframeSpec;
	from: number;
	/**
	 * Minimum spacing between two pushes of the same still-forming bar.
	 * Completed bars are always pushed.
	 */
	frequencyMs: number;
}

export type TransportBarListener = (
	handle: SubscriptionHandle,
	bar: RawBar
) => void;

/**
 * Exchange API client consumed by the feeds.
 *
 * Authentication, transport retries and symbol resolution live behind this
 * interface; feeds only decide what to do with the bars that come back.
 */
export interface TransportClient {
	/** IANA zone of the exchange clock */
	readonly timeZone: string;

	/**
	 * Split a user-facing data name into exchange and symbol.
	 * @param dataname - e.g. "BINANCE:BTC/USDT"
	 */
	resolveInstrument(dataname: string): Instrument;

	/**
	 * Fetch bars in chronological order. The last one may still be forming.
	 */
	getHistory(request: HistoryRequest): Promise<RawBar[]>;

	/**
	 * Start a push subscription. Bars arrive through the listeners registered
	 * with onBar, tagged with the returned handle.
	 */
	subscribeBars(request: BarSubscriptionRequest): Promise<SubscriptionHandle>;

	unsubscribe(handle: SubscriptionHandle): Promise<void>;

	/** Current exchange server time as UTC epoch ms */
	getExchangeTime(): Promise<number>;

	rawPriceToPrice(exchange: string, symbol: string, raw: number): number;

	onBar(listener: TransportBarListener): () => void;

	close(): Promise<void>;
}
