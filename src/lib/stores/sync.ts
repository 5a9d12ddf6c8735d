// Sync orchestrator — cache-first loads, manual refresh, paced prefetch, fallback tiers
import { writable, get, type Readable } from 'svelte/store';
import type { AggregationPeriod, TodaySummaryResponse } from '$lib/types/metrics.js';
import type {
	FallbackTier,
	HeartRateTrendsKey,
	LoadOptions,
	LoadResult,
	MetricsCacheKey,
	MetricsCacheSchema,
	MetricsKey,
	PrefetchHandle,
	PrefetchReport,
	PrefetchRequest,
	RefreshOutcome,
	SleepTrendsKey,
	SummaryLoadResult,
	SummaryView,
	SummaryViewState,
	SyncState
} from '$lib/types/sync.js';
import {
	DEFAULT_METRICS_WINDOW,
	DEVICES_KEY,
	SUMMARY_KEY,
	heartRateTrendsKey,
	isDegradedTier,
	metricsKey,
	sleepTrendsKey
} from '$lib/types/sync.js';
import type { FetchResult, RemoteHealthDataSource } from '$lib/api/health-data.js';
import type { SyncConfig } from '$lib/config.js';
import { generateInsights, mapToHealthSummary, STATIC_DEFAULT_SUMMARY } from '$lib/utils/metrics-mapper.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';
import { formatLastSync, sleep as defaultSleep, type Sleep } from '$lib/utils/time.js';
import type { MetricsCache } from './metrics-cache.js';

type Fetcher<K extends MetricsCacheKey> = (signal: AbortSignal) => Promise<FetchResult<MetricsCacheSchema[K]>>;

/** How one shared fetch ended; data is read back from the cache */
type Settled = { outcome: 'written' } | { outcome: 'failed'; error: string } | { outcome: 'aborted' };

const ABORTED: Settled = { outcome: 'aborted' };

interface InFlight {
	controller: AbortController;
	/** Callers still waiting; the fetch is aborted when the last one leaves */
	holders: number;
	promise: Promise<Settled>;
}

export interface SyncOrchestratorOptions {
	cache: MetricsCache;
	source: RemoteHealthDataSource;
	config: SyncConfig;
	logger?: Logger;
	now?: () => number;
	sleep?: Sleep;
}

/**
 * Serves the wearables screens from the metrics cache and keeps it filled.
 *
 * Every key goes through the same chain: cached value (then a background
 * refresh), network, previous value, and finally a static default (summary)
 * or an error state. At most one fetch per key is in flight; loads, refreshes
 * and the prefetch run share it.
 */
export class SyncOrchestrator {
	private readonly cache: MetricsCache;
	private readonly source: RemoteHealthDataSource;
	private readonly config: SyncConfig;
	private readonly log: Logger;
	private readonly now: () => number;
	private readonly sleep: Sleep;

	private readonly inFlight = new Map<MetricsCacheKey, InFlight>();
	private readonly background = new Set<Promise<unknown>>();
	private readonly view = writable<SummaryViewState>({ status: 'loading' });
	private activePrefetch: PrefetchHandle | null = null;
	private refreshes = 0;
	/** Bumped whenever a network summary replaces the view */
	private liveVersion = 0;
	private window: PrefetchRequest = DEFAULT_METRICS_WINDOW;
	private disposed = false;

	/** Today summary view-model for the wearables screen */
	readonly summaryView: Readable<SummaryViewState> = { subscribe: this.view.subscribe };
	readonly syncState: Readable<SyncState>;
	readonly lastSyncTime: Readable<number | null>;

	constructor(options: SyncOrchestratorOptions) {
		this.cache = options.cache;
		this.source = options.source;
		this.config = options.config;
		this.log = options.logger ?? createLogger('sync');
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? defaultSleep;
		this.syncState = this.cache.syncState;
		this.lastSyncTime = this.cache.lastSyncAt;
	}

	// === OBSERVATION ===

	currentValue<K extends MetricsCacheKey>(key: K): MetricsCacheSchema[K] | undefined {
		return this.cache.get(key);
	}

	observe<K extends MetricsCacheKey>(key: K): Readable<MetricsCacheSchema[K] | undefined> {
		return this.cache.observe(key);
	}

	lastSyncLabel(now: number = this.now()): string {
		return formatLastSync(get(this.cache.lastSyncAt), now);
	}

	/** Metrics window refresh() re-fetches */
	get selectedWindow(): PrefetchRequest {
		return this.window;
	}

	// === LOADS ===

	async loadTodaySummary(options?: LoadOptions): Promise<SummaryLoadResult> {
		const version = this.liveVersion;
		const result = await this.load(SUMMARY_KEY, this.summaryFetcher(), options, (settled) => {
			if (settled.outcome === 'written') this.publishLive();
		});
		if (result.status === 'aborted') return result;

		// The background refresh already published something newer
		const shown = get(this.view);
		if (this.liveVersion !== version && shown.status === 'ready') return shown;

		const view =
			result.status === 'ready'
				? this.buildView(result.tier, result.data, result.error)
				: this.buildView('static_default', null, result.error);
		const state = { status: 'ready' as const, ...view };
		this.view.set(state);
		return state;
	}

	/** Loading a window also selects it for refresh() */
	async loadAggregatedMetrics(
		period: AggregationPeriod,
		days: number,
		options?: LoadOptions
	): Promise<LoadResult<MetricsCacheSchema[MetricsKey]>> {
		this.window = { period, days };
		return this.load(metricsKey(period, days), this.metricsFetcher(period, days), options);
	}

	async loadDevices(options?: LoadOptions): Promise<LoadResult<MetricsCacheSchema['devices']>> {
		return this.load(DEVICES_KEY, this.devicesFetcher(), options);
	}

	async loadSleepTrends(
		days: number,
		options?: LoadOptions
	): Promise<LoadResult<MetricsCacheSchema[SleepTrendsKey]>> {
		const { patientId } = this.config;
		return this.load(
			sleepTrendsKey(days),
			(signal) => this.source.fetchSleepTrends(patientId, days, { signal }),
			options
		);
	}

	async loadHeartRateTrends(
		days: number,
		options?: LoadOptions
	): Promise<LoadResult<MetricsCacheSchema[HeartRateTrendsKey]>> {
		const { patientId } = this.config;
		return this.load(
			heartRateTrendsKey(days),
			(signal) => this.source.fetchHeartRateTrends(patientId, days, { signal }),
			options
		);
	}

	// === REFRESH ===

	/** Re-fetch summary, devices and the selected window, skipping the cache */
	async refresh(): Promise<RefreshOutcome> {
		const failures: RefreshOutcome['failures'] = [];
		this.refreshes++;
		this.cache.markSyncing();
		try {
			const summary = await this.join(SUMMARY_KEY, this.summaryFetcher());
			if (summary.outcome === 'written') {
				this.publishLive();
			} else if (summary.outcome === 'failed') {
				failures.push({ key: SUMMARY_KEY, error: summary.error });
				this.keepViewAfterFailedRefresh(summary.error);
			}

			const devices = await this.join(DEVICES_KEY, this.devicesFetcher());
			if (devices.outcome === 'failed') failures.push({ key: DEVICES_KEY, error: devices.error });

			const { period, days } = this.window;
			const key = metricsKey(period, days);
			const metrics = await this.join(key, this.metricsFetcher(period, days));
			if (metrics.outcome === 'failed') failures.push({ key, error: metrics.error });
		} finally {
			this.refreshes--;
			if (this.refreshes === 0) this.cache.markIdle();
		}

		if (failures.length) this.log.warn(`Refresh finished with ${failures.length} failure(s)`);
		return { ok: failures.length === 0, failures };
	}

	// === PREFETCH ===

	/** Warm devices and every queued window; a second call joins the running one */
	startPrefetch(): PrefetchHandle {
		if (this.activePrefetch) return this.activePrefetch;

		const controller = new AbortController();
		const release = () => {
			if (this.activePrefetch === handle) this.activePrefetch = null;
		};
		const handle: PrefetchHandle = {
			done: this.runPrefetch(controller.signal).finally(release),
			cancel: () => {
				controller.abort();
				release();
			}
		};
		this.activePrefetch = handle;
		return handle;
	}

	get isPrefetching(): boolean {
		return this.activePrefetch !== null;
	}

	private async runPrefetch(signal: AbortSignal): Promise<PrefetchReport> {
		const report: PrefetchReport = { fetched: [], skipped: [], failed: [], cancelled: false };
		const steps: { key: MetricsCacheKey; fetch: () => Promise<Settled> }[] = [
			{ key: DEVICES_KEY, fetch: () => this.join(DEVICES_KEY, this.devicesFetcher(), signal) },
			...this.config.prefetchQueue.map(({ period, days }) => {
				const key = metricsKey(period, days);
				return { key, fetch: () => this.join(key, this.metricsFetcher(period, days), signal) };
			})
		];

		this.log.debug(`Prefetch started (${steps.length} steps)`);
		let fetchedBefore = false;
		for (const step of steps) {
			if (signal.aborted) break;
			if (this.cache.hasFresh(step.key)) {
				report.skipped.push(step.key);
				continue;
			}

			if (fetchedBefore) {
				await this.sleep(this.config.prefetchDelayMs, signal);
				if (signal.aborted) break;
				if (this.cache.hasFresh(step.key)) {
					report.skipped.push(step.key);
					continue;
				}
			}

			fetchedBefore = true;
			const settled = await step.fetch();
			if (settled.outcome === 'written') {
				report.fetched.push(step.key);
			} else if (settled.outcome === 'failed') {
				this.log.warn(`Prefetch of ${step.key} failed`, settled.error);
				report.failed.push({ key: step.key, error: settled.error });
			}
		}

		report.cancelled = signal.aborted;
		this.log.debug(
			`Prefetch ${report.cancelled ? 'cancelled' : 'finished'}: ` +
				`${report.fetched.length} fetched, ${report.skipped.length} skipped, ${report.failed.length} failed`
		);
		return report;
	}

	// === LIFECYCLE ===

	/** Settle every background refresh started by cache hits */
	async waitForBackground(): Promise<void> {
		while (this.background.size > 0) {
			await Promise.all([...this.background]);
		}
	}

	/** Abort all work; nothing is written afterwards */
	dispose(): void {
		this.disposed = true;
		this.activePrefetch?.cancel();
		for (const flight of this.inFlight.values()) flight.controller.abort();
		this.inFlight.clear();
		this.view.set({ status: 'loading' });
	}

	// === INTERNALS ===

	private async load<K extends MetricsCacheKey>(
		key: K,
		fetcher: Fetcher<K>,
		options?: LoadOptions,
		onBackground?: (settled: Settled) => void
	): Promise<LoadResult<MetricsCacheSchema[K]>> {
		const signal = options?.signal;
		if (signal?.aborted) return { status: 'aborted' };

		const cached = this.cache.get(key);
		if (cached !== undefined) {
			this.track(
				this.join(key, fetcher).then((settled) => {
					onBackground?.(settled);
				})
			);
			return { status: 'ready', tier: 'fresh_cache_hit', data: cached, error: null };
		}

		const settled = await this.join(key, fetcher, signal);
		if (settled.outcome === 'aborted' || signal?.aborted) return { status: 'aborted' };

		const current = this.cache.get(key);
		if (settled.outcome === 'written' && current !== undefined) {
			return { status: 'ready', tier: 'live_from_network', data: current, error: null };
		}

		const error = settled.outcome === 'failed' ? settled.error : 'Cache cleared during fetch';
		if (current !== undefined) {
			return { status: 'ready', tier: 'stale_cache_on_error', data: current, error };
		}
		return { status: 'error', error };
	}

	/** Join the in-flight fetch for `key`, starting one if none is running */
	private join<K extends MetricsCacheKey>(key: K, fetcher: Fetcher<K>, signal?: AbortSignal): Promise<Settled> {
		if (this.disposed || signal?.aborted) return Promise.resolve(ABORTED);

		let flight = this.inFlight.get(key);
		// A flight whose holders all left is still settling; it will write nothing
		if (!flight || flight.controller.signal.aborted) {
			flight = this.launch(key, fetcher);
		}
		return this.attach(flight, signal);
	}

	private launch<K extends MetricsCacheKey>(key: K, fetcher: Fetcher<K>): InFlight {
		const controller = new AbortController();
		const flight: InFlight = { controller, holders: 0, promise: Promise.resolve(ABORTED) };
		flight.promise = this.fetchAndStore(key, fetcher, controller.signal).finally(() => {
			if (this.inFlight.get(key) === flight) this.inFlight.delete(key);
		});
		this.inFlight.set(key, flight);
		return flight;
	}

	private attach(flight: InFlight, signal?: AbortSignal): Promise<Settled> {
		flight.holders++;
		if (!signal) return flight.promise;

		return new Promise<Settled>((resolve) => {
			const onAbort = () => {
				flight.holders--;
				if (flight.holders <= 0) flight.controller.abort();
				resolve(ABORTED);
			};
			signal.addEventListener('abort', onAbort, { once: true });
			void flight.promise.then((settled) => {
				signal.removeEventListener('abort', onAbort);
				resolve(settled);
			});
		});
	}

	private async fetchAndStore<K extends MetricsCacheKey>(
		key: K,
		fetcher: Fetcher<K>,
		signal: AbortSignal
	): Promise<Settled> {
		try {
			const result = await fetcher(signal);
			if (signal.aborted || this.disposed) return ABORTED;
			if (!result.ok) {
				this.log.warn(`Fetch of ${key} failed (${result.error.kind})`, result.error.message);
				return { outcome: 'failed', error: result.error.message };
			}
			this.cache.put(key, result.data);
			this.cache.recordSync(this.now());
			return { outcome: 'written' };
		} catch (err) {
			if (signal.aborted) return ABORTED;
			const message = err instanceof Error ? err.message : String(err);
			this.log.error(`Fetch of ${key} threw`, err);
			return { outcome: 'failed', error: message };
		}
	}

	private track(task: Promise<unknown>): void {
		const tracked: Promise<unknown> = task.finally(() => {
			this.background.delete(tracked);
		});
		this.background.add(tracked);
	}

	private summaryFetcher(): Fetcher<typeof SUMMARY_KEY> {
		const { patientId } = this.config;
		return (signal) => this.source.fetchTodaySummary(patientId, { signal });
	}

	private devicesFetcher(): Fetcher<typeof DEVICES_KEY> {
		const { deviceOwnerId } = this.config;
		return (signal) => this.source.fetchPairedDevices(deviceOwnerId, { signal });
	}

	private metricsFetcher(period: AggregationPeriod, days: number): Fetcher<MetricsKey> {
		const { patientId } = this.config;
		return (signal) => this.source.fetchAggregatedMetrics(patientId, period, days, { signal });
	}

	private buildView(tier: FallbackTier, response: TodaySummaryResponse | null, error: string | null): SummaryView {
		const summary = response
			? mapToHealthSummary(response.summary, this.config.caloriesGoal)
			: { ...STATIC_DEFAULT_SUMMARY, caloriesGoal: this.config.caloriesGoal };
		return {
			tier,
			degraded: isDegradedTier(tier),
			summary,
			insights: generateInsights(summary),
			date: response?.date ?? null,
			error,
			refreshError: null
		};
	}

	private publishLive(): void {
		const response = this.cache.get(SUMMARY_KEY);
		if (!response || this.disposed) return;
		this.liveVersion++;
		this.view.set({ status: 'ready', ...this.buildView('live_from_network', response, null) });
	}

	/** A failed refresh keeps what is on screen and only reports the error */
	private keepViewAfterFailedRefresh(error: string): void {
		const current = get(this.view);
		if (current.status === 'ready') {
			this.view.set({ ...current, refreshError: error });
			return;
		}
		const stale = this.cache.get(SUMMARY_KEY);
		const view = stale
			? this.buildView('stale_cache_on_error', stale, error)
			: this.buildView('static_default', null, error);
		this.view.set({ status: 'ready', ...view, refreshError: error });
	}
}
