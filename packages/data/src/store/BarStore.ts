import { createLogger, errorMessage } from "@barline/core";
import type { ModuleLogger, TransportClient } from "@barline/core";
import { BarFeed } from "../feed/BarFeed";
import type { BarFeedContext, BarFeedOptions } from "../feed/BarFeed";
import { BarInbox } from "../inbox/BarInbox";
import { NotificationQueue } from "../notifications/NotificationQueue";

export type BarFeedFactory = (
	options: BarFeedOptions,
	context: BarFeedContext
) => BarFeed;

export interface StoreNotification {
	message: string;
	at: number;
	data?: Record<string, unknown>;
}

export interface BarStoreOptions {
	/** Transports by provider name; the first one is the default */
	providers: Record<string, TransportClient>;
	feedFactory?: BarFeedFactory;
	logger?: ModuleLogger;
	now?: () => number;
}

type StoreState = "idle" | "started" | "stopped";

export const createBarFeed: BarFeedFactory = (options, context) =>
	new BarFeed(options, context);

/**
 * Owns the transports, the shared inbox and every feed created from them.
 */
export class BarStore {
	readonly inbox: BarInbox;

	private readonly providers: Map<string, TransportClient>;
	private readonly feedFactory: BarFeedFactory;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly notifications = new NotificationQueue<StoreNotification>();
	private readonly feeds: BarFeed[] = [];
	private detachers: Array<() => void> = [];
	private state: StoreState = "idle";

	constructor(options: BarStoreOptions) {
		this.providers = new Map(Object.entries(options.providers));
		if (this.providers.size === 0) {
			throw new Error("BarStore needs at least one provider");
		}
		this.feedFactory = options.feedFactory ?? createBarFeed;
		this.logger = options.logger ?? createLogger("data:store");
		this.now = options.now ?? Date.now;
		this.inbox = new BarInbox(this.logger, this.now);
	}

	get isStarted(): boolean {
		return this.state === "started";
	}

	get providerNames(): string[] {
		return [...this.providers.keys()];
	}

	getProvider(name: string): TransportClient {
		const transport = this.providers.get(name);
		if (!transport) {
			throw new Error(
				`Unknown provider "${name}". Registered: ${this.providerNames.join(", ")}`
			);
		}
		return transport;
	}

	/** Open the inbox and route every transport's pushed bars into it. */
	start(): void {
		if (this.state === "started") {
			throw new Error("BarStore already started");
		}
		if (this.state === "stopped") {
			throw new Error("BarStore was stopped");
		}

		this.inbox.openInbox();
		for (const [providerName, transport] of this.providers) {
			this.detachers.push(
				transport.onBar((handle, bar) => {
					this.inbox.push(providerName, handle, bar);
				})
			);
		}
		this.state = "started";
		this.putNotification("store_started", { providers: this.providerNames });
		this.logger.info("store_started", { providers: this.providerNames });
	}

	/**
	 * @throws Error when the store is stopped or the provider is unknown
	 */
	createFeed(options: BarFeedOptions): BarFeed {
		if (this.state === "stopped") {
			throw new Error("Cannot create a feed on a stopped BarStore");
		}
		const providerName = options.providerName ?? this.providerNames[0];
		const feed = this.feedFactory(options, {
			transport: this.getProvider(providerName),
			inbox: this.inbox,
			providerName,
			logger: this.logger,
			now: this.now,
		});
		this.feeds.push(feed);
		return feed;
	}

	async stop(): Promise<void> {
		if (this.state === "stopped") {
			return;
		}
		this.state = "stopped";

		for (const feed of this.feeds) {
			await feed.stop();
		}
		for (const detach of this.detachers) {
			detach();
		}
		this.detachers = [];

		for (const [providerName, transport] of this.providers) {
			try {
				await transport.close();
			} catch (error) {
				this.logger.error("transport_close_failed", {
					providerName,
					message: errorMessage(error),
				});
			}
		}
		this.inbox.close();
		this.putNotification("store_stopped", { feeds: this.feeds.length });
		this.logger.info("store_stopped", { feeds: this.feeds.length });
	}

	putNotification(message: string, data?: Record<string, unknown>): void {
		this.notifications.push({ message, at: this.now(), data });
	}

	getNotifications(): StoreNotification[] {
		return this.notifications.drain();
	}
}
