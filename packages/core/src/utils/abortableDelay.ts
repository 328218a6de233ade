/**
 * Wait for `ms` milliseconds unless `signal` aborts first.
 * Resolves `true` when the wait was cut short by the signal.
 */
export const abortableDelay = (
	ms: number,
	signal: AbortSignal
): Promise<boolean> => {
	if (signal.aborted) {
		return Promise.resolve(true);
	}
	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(true);
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve(false);
		}, Math.max(ms, 0));
		signal.addEventListener("abort", onAbort, { once: true });
	});
};
