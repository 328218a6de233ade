export type {
	BarSubscriptionRequest,
	HistoryRequest,
	TransportBarListener,
	TransportClient,
} from "./TransportClient";
export type { ExchangeCalendar } from "./ExchangeCalendar";
