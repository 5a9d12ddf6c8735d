// Time helpers — abortable delay and "last synced" labels

/** Resolves after `ms`, or as soon as `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

export type Sleep = typeof sleep;

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

function plural(n: number, unit: string): string {
	return n === 1 ? `1 ${unit} ago` : `${n} ${unit}s ago`;
}

/** "Never", "Just now", "3 mins ago", "1 hour ago", "2 days ago" */
export function formatLastSync(lastSyncAt: number | null, now: number = Date.now()): string {
	if (lastSyncAt === null) return 'Never';

	const elapsed = Math.max(0, now - lastSyncAt);
	if (elapsed < MINUTE_MS) return 'Just now';
	if (elapsed < HOUR_MS) return plural(Math.floor(elapsed / MINUTE_MS), 'min');
	if (elapsed < DAY_MS) return plural(Math.floor(elapsed / HOUR_MS), 'hour');
	return plural(Math.floor(elapsed / DAY_MS), 'day');
}
