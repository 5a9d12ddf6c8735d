// Sync engine types — cache keys, sync state, fallback tiers, prefetch queue
import type {
	AggregationPeriod,
	AggregatedMetricsResponse,
	HealthInsight,
	HealthSummary,
	HeartRateTrendsResponse,
	SleepTrendsResponse,
	TodaySummaryResponse,
	WearableDevice
} from './metrics.js';

// === CACHE ===

/** A cached value plus the epoch-ms time it was written */
export interface CacheEntry<V> {
	value: V;
	writtenAt: number;
}

export type MetricsKey = `metrics:${AggregationPeriod}:${number}`;
export type SleepTrendsKey = `trends:sleep:${number}`;
export type HeartRateTrendsKey = `trends:heart-rate:${number}`;

/** Every key the metrics cache holds, mapped to its value type */
export interface MetricsCacheSchema {
	'summary:today': TodaySummaryResponse;
	devices: WearableDevice[];
	[key: MetricsKey]: AggregatedMetricsResponse;
	[key: SleepTrendsKey]: SleepTrendsResponse;
	[key: HeartRateTrendsKey]: HeartRateTrendsResponse;
}

export type MetricsCacheKey = keyof MetricsCacheSchema & string;

export const SUMMARY_KEY = 'summary:today';
export const DEVICES_KEY = 'devices';

export function metricsKey(period: AggregationPeriod, days: number): MetricsKey {
	return `metrics:${period}:${days}`;
}

export function sleepTrendsKey(days: number): SleepTrendsKey {
	return `trends:sleep:${days}`;
}

export function heartRateTrendsKey(days: number): HeartRateTrendsKey {
	return `trends:heart-rate:${days}`;
}

// === SYNC STATE ===

export type SyncStatus = 'idle' | 'syncing';

export interface SyncState {
	status: SyncStatus;
	/** Epoch ms of the last successful network write, null if never */
	lastSyncAt: number | null;
}

export function initialSyncState(): SyncState {
	return { status: 'idle', lastSyncAt: null };
}

// === FALLBACK TIERS ===

/** Ranked best → worst; the UI shows an offline banner below the first two */
export type FallbackTier =
	| 'live_from_network'
	| 'fresh_cache_hit'
	| 'stale_cache_on_error'
	| 'static_default';

const FALLBACK_TIER_ORDER: readonly FallbackTier[] = [
	'live_from_network',
	'fresh_cache_hit',
	'stale_cache_on_error',
	'static_default'
];

/** Stale and static views are shown with an offline banner */
export function isDegradedTier(tier: FallbackTier): boolean {
	return FALLBACK_TIER_ORDER.indexOf(tier) >= FALLBACK_TIER_ORDER.indexOf('stale_cache_on_error');
}

/** Result of loading one cache key */
export type LoadResult<T> =
	| { status: 'ready'; tier: FallbackTier; data: T; error: string | null }
	| { status: 'error'; error: string }
	| { status: 'aborted' };

/** Today summary view-model handed to the wearables screen */
export interface SummaryView {
	tier: FallbackTier;
	/** Below the first two tiers */
	degraded: boolean;
	summary: HealthSummary;
	insights: HealthInsight[];
	/** Backend date of the summary, null for the static default */
	date: string | null;
	/** Why the network value could not be used (stale/static tiers) */
	error: string | null;
	/** Set when a manual refresh failed while this view stayed on screen */
	refreshError: string | null;
}

export type SummaryViewState =
	| { status: 'loading' }
	| ({ status: 'ready' } & SummaryView);

/** Aborted loads hand back nothing and leave the view untouched */
export type SummaryLoadResult = ({ status: 'ready' } & SummaryView) | { status: 'aborted' };

export interface LoadOptions {
	/** Abort when the owning screen goes away */
	signal?: AbortSignal;
}

export interface RefreshOutcome {
	ok: boolean;
	/** Keys whose refresh failed, with the failure message */
	failures: { key: MetricsCacheKey; error: string }[];
}

// === PREFETCH ===

/** Window the metrics chart shows until the user picks another */
export const DEFAULT_METRICS_WINDOW: PrefetchRequest = Object.freeze({ period: 'daily', days: 7 });

export interface PrefetchRequest {
	readonly period: AggregationPeriod;
	readonly days: number;
}

/** Windows the wearables screen offers, in the order they are warmed */
export const DEFAULT_PREFETCH_QUEUE: readonly PrefetchRequest[] = Object.freeze([
	{ period: 'hourly', days: 1 },
	{ period: 'daily', days: 7 },
	{ period: 'daily', days: 30 },
	{ period: 'weekly', days: 90 }
]);

/** Pause between prefetch network operations */
export const PREFETCH_DELAY_MS = 50;

export interface PrefetchReport {
	fetched: MetricsCacheKey[];
	skipped: MetricsCacheKey[];
	failed: { key: MetricsCacheKey; error: string }[];
	cancelled: boolean;
}

export interface PrefetchHandle {
	/** Resolves when the run finishes or is cancelled; never rejects */
	readonly done: Promise<PrefetchReport>;
	cancel(): void;
}
