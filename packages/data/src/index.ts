export { BarInbox } from "./inbox/BarInbox";
export type { InboxClaim, InboxEntry } from "./inbox/BarInbox";
export { NotificationQueue } from "./notifications/NotificationQueue";
export {
	UNBOUNDED_SESSION,
	evaluateBar,
	isBarValid,
} from "./session/sessionFilter";
export type {
	BarRejection,
	BarVerdict,
	SessionFilterInput,
} from "./session/sessionFilter";
export { ScheduledBarPoller } from "./sources/ScheduledBarPoller";
export type { ScheduledBarPollerOptions } from "./sources/ScheduledBarPoller";
export {
	PushBarSubscriber,
	SESSION_ROLLOVER_FREQUENCY_MS,
} from "./sources/PushBarSubscriber";
export type { PushBarSubscriberOptions } from "./sources/PushBarSubscriber";
export type { BarSource, BarSourceMode } from "./sources/types";
export { BarReconciler } from "./reconcile/BarReconciler";
export type {
	BarNormalizer,
	BarReconcilerOptions,
	ExchangeClock,
	ReconcilerMode,
	ReconcilerState,
	ReconcilerStats,
} from "./reconcile/BarReconciler";
export { BarFeed } from "./feed/BarFeed";
export type { BarFeedContext, BarFeedOptions } from "./feed/BarFeed";
export { BarStore, createBarFeed } from "./store/BarStore";
export type {
	BarFeedFactory,
	BarStoreOptions,
	StoreNotification,
} from "./store/BarStore";
export { SessionSchedule } from "./schedule/SessionSchedule";
