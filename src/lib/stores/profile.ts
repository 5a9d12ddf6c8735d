// Profile repository — fresh cache, then network, then any cached copy
import { writable, type Readable } from 'svelte/store';
import type { PatientProfile, ProfileResult } from '$lib/types/profile.js';
import type { RemoteHealthDataSource } from '$lib/api/health-data.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';
import type { PersistentProfileCache } from './profile-cache.js';

export interface GetProfileOptions {
	forceRefresh?: boolean;
	signal?: AbortSignal;
}

/**
 * Profile fetch policy:
 * 1. Not forcing and the cached copy is within TTL → cached copy, no network.
 * 2. Network success → persist and return.
 * 3. Network failure → any cached copy, even expired, as a degraded success;
 *    the failure reaches the caller only when nothing was ever cached.
 */
export class ProfileRepository {
	private readonly current = writable<PatientProfile | null>(null);
	private readonly log: Logger;

	/** Last profile handed out */
	readonly profile: Readable<PatientProfile | null> = { subscribe: this.current.subscribe };

	constructor(
		private readonly source: RemoteHealthDataSource,
		private readonly cache: PersistentProfileCache,
		logger?: Logger
	) {
		this.log = logger ?? createLogger('profile');
	}

	async getProfile(patientId: string, options?: GetProfileOptions): Promise<ProfileResult> {
		if (!options?.forceRefresh) {
			const cached = await this.cache.read();
			if (cached && this.cache.isValid(cached)) {
				this.log.debug('Returning cached patient profile');
				this.current.set(cached.value);
				return { ok: true, profile: cached.value, source: 'fresh_cache', error: null };
			}
		}

		this.log.debug(`Fetching patient profile ${patientId}`);
		let failure: string;
		try {
			const result = await this.source.fetchProfile(patientId, { signal: options?.signal });
			if (result.ok) {
				await this.persist(result.data);
				this.current.set(result.data);
				return { ok: true, profile: result.data, source: 'network', error: null };
			}
			failure = result.error.message;
		} catch (err) {
			failure = err instanceof Error ? err.message : 'Failed to fetch patient profile';
		}

		this.log.error('Error fetching patient profile', failure);
		const stale = await this.cache.read();
		if (stale) {
			this.log.debug('Returning stale cached profile due to API error');
			this.current.set(stale.value);
			return { ok: true, profile: stale.value, source: 'stale_cache', error: failure };
		}
		return { ok: false, error: failure };
	}

	/** Forget the profile in memory and on disk (logout) */
	async clear(): Promise<void> {
		this.current.set(null);
		await this.cache.clear();
	}

	private async persist(profile: PatientProfile): Promise<void> {
		try {
			await this.cache.write(profile);
		} catch (err) {
			// A fresh profile is still returned; the next read just misses the cache
			this.log.warn('Error caching patient profile', err);
		}
	}
}
