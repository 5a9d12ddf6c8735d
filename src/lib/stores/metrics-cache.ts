// Metrics cache — session-scoped keyed cache exposed as svelte stores
import { writable, derived, get, type Readable } from 'svelte/store';
import type { CacheEntry, MetricsCacheSchema, SyncState } from '$lib/types/sync.js';
import { initialSyncState } from '$lib/types/sync.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';

type CacheEntries<S> = { [K in keyof S]?: CacheEntry<S[K]> };

export type CacheKeyOf<S> = keyof S & string;

export interface ReactiveCacheOptions {
	now?: () => number;
	logger?: Logger;
}

/**
 * Keyed cache whose whole content is one immutable snapshot. `put` swaps the
 * snapshot in a single store update, so readers see the old value or the new
 * one. Freshness is presence-only unless a caller asks for an age bound.
 */
export class ReactiveCache<S> {
	private readonly entries = writable<CacheEntries<S>>({});
	private readonly sync = writable<SyncState>(initialSyncState());
	private readonly now: () => number;
	private readonly log: Logger;

	/** Idle/syncing plus time of the last successful network write */
	readonly syncState: Readable<SyncState> = { subscribe: this.sync.subscribe };

	readonly lastSyncAt: Readable<number | null> = derived(this.sync, ($s) => $s.lastSyncAt);

	constructor(options?: ReactiveCacheOptions) {
		this.now = options?.now ?? Date.now;
		this.log = options?.logger ?? createLogger('metrics-cache');
	}

	/** Current value, never triggers I/O */
	get<K extends CacheKeyOf<S>>(key: K): S[K] | undefined {
		return get(this.entries)[key]?.value;
	}

	/** Current value with its write time */
	entry<K extends CacheKeyOf<S>>(key: K): CacheEntry<S[K]> | undefined {
		return get(this.entries)[key];
	}

	/** Replace the value for `key` and notify observers; no merge */
	put<K extends CacheKeyOf<S>>(key: K, value: S[K]): void {
		const entry: CacheEntry<S[K]> = { value, writtenAt: this.now() };
		this.entries.update(($entries) => {
			const next: CacheEntries<S> = { ...$entries };
			next[key] = entry;
			return next;
		});
		this.log.debug(`Cached ${key}`);
	}

	/** Live value of `key`; new subscribers get the current value first */
	observe<K extends CacheKeyOf<S>>(key: K): Readable<S[K] | undefined> {
		return derived(this.entries, ($entries) => $entries[key]?.value);
	}

	/** Presence only, no TTL */
	hasFresh<K extends CacheKeyOf<S>>(key: K): boolean {
		return get(this.entries)[key] !== undefined;
	}

	/** Present and written less than `maxAgeMs` ago */
	isYoungerThan<K extends CacheKeyOf<S>>(key: K, maxAgeMs: number, now?: number): boolean {
		const current = this.entry(key);
		if (!current) return false;
		return (now ?? this.now()) - current.writtenAt < maxAgeMs;
	}

	/** Drop every entry and reset sync state (logout) */
	clearAll(): void {
		this.log.debug('Clearing all cache');
		this.entries.set({});
		this.sync.set(initialSyncState());
	}

	// --- Sync state writers (orchestrator only) ---

	markSyncing(): void {
		this.sync.update(($s) => ({ ...$s, status: 'syncing' }));
	}

	markIdle(): void {
		this.sync.update(($s) => ({ ...$s, status: 'idle' }));
	}

	recordSync(at: number = this.now()): void {
		this.sync.update(($s) => ({ ...$s, lastSyncAt: at }));
	}
}

/** The cache behind the wearables screens */
export class MetricsCache extends ReactiveCache<MetricsCacheSchema> {}

export function createMetricsCache(options?: ReactiveCacheOptions): MetricsCache {
	return new MetricsCache(options);
}
