const SENTINEL: unique symbol = Symbol("notification-queue-sentinel");

/**
 * FIFO of status events.
 *
 * drain() returns exactly what was queued before the call; anything pushed
 * while the caller iterates the result waits for the next drain.
 */
export class NotificationQueue<T> {
	private readonly items: Array<T | typeof SENTINEL> = [];

	get size(): number {
		return this.items.length;
	}

	push(item: T): void {
		this.items.push(item);
	}

	drain(): T[] {
		this.items.push(SENTINEL);
		const drained: T[] = [];
		for (;;) {
			const item = this.items.shift();
			if (item === SENTINEL || item === undefined) {
				return drained;
			}
			drained.push(item);
		}
	}
}
