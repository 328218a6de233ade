import { randomUUID } from "node:crypto";
import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import WebSocket from "ws";
import {
	createLogger,
	errorMessage,
	formatTimeframe,
} from "@barline/core";
import type {
	BarSubscriptionRequest,
	HistoryRequest,
	Instrument,
	ModuleLogger,
	RawBar,
	SubscriptionHandle,
	TransportBarListener,
	TransportClient,
} from "@barline/core";
import { parseKlineMessage } from "./klineMessage";
import type { KlineUpdate } from "./klineMessage";
import { mapOhlcvRow } from "./ohlcv";

/** The part of a ccxt exchange this client talks to. */
export interface CcxtMarketApi {
	readonly markets: Record<string, unknown> | undefined;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
	fetchTime(): Promise<number | undefined>;
	loadMarkets(): Promise<unknown>;
	priceToPrecision(symbol: string, price: number): string;
}

export interface StreamSocket {
	on(event: "open", listener: () => void): unknown;
	on(event: "close", listener: () => void): unknown;
	on(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
	on(event: "error", listener: (error: Error) => void): unknown;
	removeAllListeners(): unknown;
	terminate(): void;
}

export type SocketFactory = (url: string) => StreamSocket;

export interface CcxtTransportOptions {
	/** ccxt exchange id, e.g. "binance" or "binanceusdm" */
	exchangeId: string;
	/** IANA zone of the exchange clock */
	timeZone?: string;
	apiKey?: string;
	secret?: string;
	/** Combined-stream endpoint serving `<symbol>@kline_<interval>` */
	streamEndpoint?: string;
	exchange?: CcxtMarketApi;
	socketFactory?: SocketFactory;
	pageLimit?: number;
	reconnectDelayMs?: number;
	logger?: ModuleLogger;
	now?: () => number;
}

type ExchangeConstructor = new (config: Record<string, unknown>) => Exchange;

const EXCHANGES = new Map<string, ExchangeConstructor>([
	["binance", ccxt.binance],
	["binanceusdm", ccxt.binanceusdm],
	["bybit", ccxt.bybit],
	["mexc", ccxt.mexc],
	["okx", ccxt.okx],
]);

const STREAM_ENDPOINTS = new Map<string, string>([
	["binance", "wss://stream.binance.com:9443/stream"],
	["binanceusdm", "wss://fstream.binance.com/stream"],
]);

const DEFAULT_PAGE_LIMIT = 500;
const DEFAULT_RECONNECT_DELAY_MS = 1_000;

interface StreamSubscription {
	handle: SubscriptionHandle;
	url: string;
	frequencyMs: number;
	running: boolean;
	socket: StreamSocket | null;
	reconnectTimer: ReturnType<typeof setTimeout> | null;
	lastFormingPushAt: number;
}

const createExchange = (options: CcxtTransportOptions): Exchange => {
	const ExchangeClass = EXCHANGES.get(options.exchangeId);
	if (!ExchangeClass) {
		throw new Error(
			`Unsupported ccxt exchange "${options.exchangeId}". Supported: ${[
				...EXCHANGES.keys(),
			].join(", ")}`
		);
	}
	return new ExchangeClass({
		apiKey: options.apiKey || undefined,
		secret: options.secret || undefined,
		enableRateLimit: true,
	});
};

/**
 * Transport over a ccxt REST client and an exchange kline WebSocket stream.
 */
export class CcxtTransportClient implements TransportClient {
	readonly timeZone: string;
	readonly exchangeId: string;

	private readonly exchange: CcxtMarketApi;
	private readonly socketFactory: SocketFactory;
	private readonly streamEndpoint: string | undefined;
	private readonly pageLimit: number;
	private readonly reconnectDelayMs: number;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly listeners = new Set<TransportBarListener>();
	private readonly subscriptions = new Map<
		SubscriptionHandle,
		StreamSubscription
	>();
	private marketsLoaded = false;

	constructor(options: CcxtTransportOptions) {
		this.exchangeId = options.exchangeId;
		this.timeZone = options.timeZone ?? "UTC";
		this.exchange = options.exchange ?? createExchange(options);
		this.socketFactory =
			options.socketFactory ?? ((url) => new WebSocket(url));
		this.streamEndpoint =
			options.streamEndpoint ?? STREAM_ENDPOINTS.get(options.exchangeId);
		this.pageLimit = options.pageLimit ?? DEFAULT_PAGE_LIMIT;
		this.reconnectDelayMs =
			options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
		this.logger =
			options.logger ?? createLogger(`exchange:${options.exchangeId}`);
		this.now = options.now ?? Date.now;
	}

	resolveInstrument(dataname: string): Instrument {
		const separator = dataname.indexOf(":");
		const exchange =
			separator === -1
				? this.exchangeId.toUpperCase()
				: dataname.slice(0, separator).trim().toUpperCase();
		const symbol = (separator === -1 ? dataname : dataname.slice(separator + 1))
			.trim()
			.toUpperCase();
		if (!exchange || !/^[A-Z0-9]+\/[A-Z0-9]+(:[A-Z0-9]+)?$/.test(symbol)) {
			throw new Error(
				`Invalid data name "${dataname}". Expected "EXCHANGE:BASE/QUOTE" or "BASE/QUOTE"`
			);
		}
		return { exchange, symbol };
	}

	/** Pages forward from `from` until `to` or an empty page. */
	async getHistory(request: HistoryRequest): Promise<RawBar[]> {
		await this.ensureMarketsLoaded();
		const timeframe = formatTimeframe(request.timeframe);
		const bars: RawBar[] = [];
		let since = request.from;

		for (;;) {
			const rows = await this.exchange.fetchOHLCV(
				request.symbol,
				timeframe,
				since,
				this.pageLimit
			);
			let lastTimestamp = Number.NEGATIVE_INFINITY;
			for (const row of rows) {
				const bar = mapOhlcvRow(row);
				lastTimestamp = Math.max(lastTimestamp, bar.timestamp);
				if (request.to !== undefined && bar.timestamp > request.to) {
					return bars;
				}
				const previous = bars.at(-1);
				const isNew = !previous || bar.timestamp > previous.timestamp;
				if (bar.timestamp >= since && isNew) {
					bars.push(bar);
				}
			}

			if (rows.length < this.pageLimit || lastTimestamp < since) {
				break;
			}
			since = lastTimestamp + 1;
		}

		this.logger.debug("history_fetched", {
			symbol: request.symbol,
			timeframe,
			from: request.from,
			to: request.to,
			bars: bars.length,
		});
		return bars;
	}

	/**
	 * Delivers history from `request.from` through the bar listeners, then
	 * streams klines.
	 * @throws Error when no kline stream is known for the exchange
	 */
	async subscribeBars(
		request: BarSubscriptionRequest
	): Promise<SubscriptionHandle> {
		const endpoint = this.streamEndpoint;
		if (!endpoint) {
			throw new Error(
				`No kline stream configured for exchange "${this.exchangeId}"`
			);
		}

		const handle = randomUUID();
		const streamSymbol = request.symbol
			.split(":")[0]
			.replace(/[^A-Za-z0-9]/g, "")
			.toLowerCase();
		const stream = `${streamSymbol}@kline_${formatTimeframe(request.timeframe)}`;
		const subscription: StreamSubscription = {
			handle,
			url: `${endpoint}?streams=${stream}`,
			frequencyMs: request.frequencyMs,
			running: true,
			socket: null,
			reconnectTimer: null,
			lastFormingPushAt: this.now(),
		};
		this.subscriptions.set(handle, subscription);

		const history = await this.getHistory(request);
		for (const bar of history) {
			this.emit(handle, bar);
		}

		if (subscription.running) {
			this.connect(subscription);
		}
		this.logger.info("stream_subscribed", {
			handle,
			symbol: request.symbol,
			timeframe: formatTimeframe(request.timeframe),
			historyBars: history.length,
		});
		return handle;
	}

	async unsubscribe(handle: SubscriptionHandle): Promise<void> {
		const subscription = this.subscriptions.get(handle);
		if (!subscription) {
			return;
		}
		this.subscriptions.delete(handle);
		subscription.running = false;
		if (subscription.reconnectTimer) {
			clearTimeout(subscription.reconnectTimer);
			subscription.reconnectTimer = null;
		}
		this.cleanupSocket(subscription);
		this.logger.info("stream_unsubscribed", { handle });
	}

	/** @returns exchange server time as UTC epoch ms */
	async getExchangeTime(): Promise<number> {
		const time = await this.exchange.fetchTime();
		if (time === undefined) {
			throw new Error(`Exchange "${this.exchangeId}" did not report its time`);
		}
		return time;
	}

	/** Rounds to the market's price precision once markets are loaded. */
	rawPriceToPrice(_exchange: string, symbol: string, raw: number): number {
		if (!this.marketsLoaded || this.exchange.markets?.[symbol] === undefined) {
			return raw;
		}
		return Number(this.exchange.priceToPrecision(symbol, raw));
	}

	onBar(listener: TransportBarListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	async close(): Promise<void> {
		for (const handle of [...this.subscriptions.keys()]) {
			await this.unsubscribe(handle);
		}
		this.listeners.clear();
	}

	private emit(handle: SubscriptionHandle, bar: RawBar): void {
		for (const listener of this.listeners) {
			listener(handle, bar);
		}
	}

	private connect(subscription: StreamSubscription): void {
		if (!subscription.running) {
			return;
		}

		const socket = this.socketFactory(subscription.url);
		subscription.socket = socket;

		socket.on("open", () => {
			this.logger.info("stream_connected", {
				handle: subscription.handle,
				url: subscription.url,
			});
		});

		socket.on("message", (payload) => {
			this.handleMessage(subscription, payload.toString());
		});

		socket.on("close", () => {
			this.logger.warn("stream_disconnected", {
				handle: subscription.handle,
			});
			this.scheduleReconnect(subscription);
		});

		socket.on("error", (error) => {
			this.logger.error("stream_error", {
				handle: subscription.handle,
				message: errorMessage(error),
			});
		});
	}

	private scheduleReconnect(subscription: StreamSubscription): void {
		if (!subscription.running || subscription.reconnectTimer) {
			return;
		}

		subscription.reconnectTimer = setTimeout(() => {
			subscription.reconnectTimer = null;
			this.cleanupSocket(subscription);
			this.connect(subscription);
		}, this.reconnectDelayMs);
	}

	private cleanupSocket(subscription: StreamSubscription): void {
		const socket = subscription.socket;
		if (!socket) {
			return;
		}
		subscription.socket = null;
		socket.removeAllListeners();
		try {
			socket.terminate();
		} catch (error) {
			this.logger.debug("stream_terminate_failed", {
				handle: subscription.handle,
				message: errorMessage(error),
			});
		}
	}

	private handleMessage(subscription: StreamSubscription, raw: string): void {
		if (!subscription.running) {
			return;
		}

		let update: KlineUpdate | null;
		try {
			update = parseKlineMessage(raw);
		} catch (error) {
			this.logger.error("stream_parse_error", {
				handle: subscription.handle,
				message: errorMessage(error),
			});
			return;
		}
		if (!update) {
			return;
		}

		if (!update.closed) {
			const now = this.now();
			if (now - subscription.lastFormingPushAt < subscription.frequencyMs) {
				return;
			}
			subscription.lastFormingPushAt = now;
		}
		this.emit(subscription.handle, update.bar);
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
