import type { SubscriptionHandle } from "@barline/core";

export type BarSourceMode = "schedule" | "subscription";

/**
 * Producer of raw bars for one feed. Bars never come back through this
 * interface; they land in the shared inbox under the returned handle.
 */
export interface BarSource {
	readonly mode: BarSourceMode;
	readonly handle: SubscriptionHandle | null;
	start(): Promise<SubscriptionHandle>;
	stop(): Promise<void>;
}
