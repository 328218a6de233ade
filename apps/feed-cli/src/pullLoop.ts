import { abortableDelay } from "@barline/core";
import type { Bar, FeedNotification, LoadResult } from "@barline/core";

export interface PullableFeed {
	load(): Promise<LoadResult>;
	drainNotifications(): FeedNotification[];
}

export interface PullLoopOptions {
	feed: PullableFeed;
	/** Sleep between loads while the feed has nothing new */
	idleMs: number;
	signal: AbortSignal;
	onBar: (bar: Bar) => void;
	onNotification?: (notification: FeedNotification) => void;
}

export interface PullLoopResult {
	bars: number;
	reason: "end" | "aborted";
}

/**
 * Host-side driver: drain notifications once per cycle, then ask the feed for
 * its next bar.
 */
export const runPullLoop = async ({
	feed,
	idleMs,
	signal,
	onBar,
	onNotification,
}: PullLoopOptions): Promise<PullLoopResult> => {
	let bars = 0;
	const drain = (): void => {
		for (const notification of feed.drainNotifications()) {
			onNotification?.(notification);
		}
	};

	while (!signal.aborted) {
		drain();
		const result = await feed.load();
		if (result.kind === "end") {
			drain();
			return { bars, reason: "end" };
		}
		if (result.kind === "bar") {
			bars += 1;
			onBar(result.bar);
			continue;
		}
		if (await abortableDelay(idleMs, signal)) {
			break;
		}
	}

	drain();
	return { bars, reason: "aborted" };
};
