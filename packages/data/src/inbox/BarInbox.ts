import { createLogger } from "@barline/core";
import type { ModuleLogger, RawBar, SubscriptionHandle } from "@barline/core";

export interface InboxEntry {
	providerName: string;
	handle: SubscriptionHandle;
	bar: RawBar;
	receivedAt: number;
}

export interface InboxClaim {
	entry: InboxEntry;
	/** Matching entries present before this claim, including the claimed one */
	matched: number;
}

/**
 * Shared inbox of raw bars from every poller and push subscription.
 *
 * Producers append; each reconciler removes only entries carrying its own
 * provider name and handle, oldest first. Mutations run on the event loop, so
 * an entry can never be claimed twice.
 */
export class BarInbox {
	private readonly entries: InboxEntry[] = [];
	private open = false;
	private dropped = 0;

	constructor(
		private readonly logger: ModuleLogger = createLogger("data:inbox"),
		private readonly now: () => number = Date.now
	) {}

	get isOpen(): boolean {
		return this.open;
	}

	get size(): number {
		return this.entries.length;
	}

	get droppedCount(): number {
		return this.dropped;
	}

	/** Accept bars from now on. Entries left from a previous run are discarded. */
	openInbox(): void {
		this.entries.length = 0;
		this.open = true;
	}

	/** Stop accepting bars and discard everything still pending. */
	close(): void {
		if (this.entries.length > 0) {
			this.logger.info("inbox_closed_with_pending", {
				pending: this.entries.length,
			});
		}
		this.entries.length = 0;
		this.open = false;
	}

	push(providerName: string, handle: SubscriptionHandle, bar: RawBar): boolean {
		if (!this.open) {
			this.dropped += 1;
			this.logger.debug("inbox_push_dropped", {
				providerName,
				handle,
				timestamp: bar.timestamp,
			});
			return false;
		}
		this.entries.push({ providerName, handle, bar, receivedAt: this.now() });
		return true;
	}

	pending(providerName: string, handle: SubscriptionHandle): number {
		let count = 0;
		for (const entry of this.entries) {
			if (entry.providerName === providerName && entry.handle === handle) {
				count += 1;
			}
		}
		return count;
	}

	/**
	 * Remove and return the oldest entry for this subscription, or null when
	 * nothing is waiting.
	 */
	claim(providerName: string, handle: SubscriptionHandle): InboxClaim | null {
		let firstIndex = -1;
		let matched = 0;
		this.entries.forEach((entry, index) => {
			if (entry.providerName !== providerName || entry.handle !== handle) {
				return;
			}
			matched += 1;
			if (firstIndex === -1) {
				firstIndex = index;
			}
		});

		if (firstIndex === -1) {
			return null;
		}

		const [entry] = this.entries.splice(firstIndex, 1);
		return { entry, matched };
	}

	/** Drop every entry of one subscription, e.g. after it was cancelled. */
	discard(providerName: string, handle: SubscriptionHandle): number {
		let removed = 0;
		for (let index = this.entries.length - 1; index >= 0; index -= 1) {
			const entry = this.entries[index];
			if (entry.providerName === providerName && entry.handle === handle) {
				this.entries.splice(index, 1);
				removed += 1;
			}
		}
		return removed;
	}
}
