export { CcxtTransportClient } from "./CcxtTransportClient";
export type {
	CcxtMarketApi,
	CcxtTransportOptions,
	SocketFactory,
	StreamSocket,
} from "./CcxtTransportClient";
export { parseKlineMessage } from "./klineMessage";
export type { KlineUpdate } from "./klineMessage";
export { mapOhlcvRow } from "./ohlcv";
