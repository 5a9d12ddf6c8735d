// Durable profile cache — one serialized profile plus its write time, 5-minute TTL
import { z } from 'zod';
import type { CachedProfile, PatientProfile } from '$lib/types/profile.js';
import { PROFILE_CACHE_TTL_MS } from '$lib/types/profile.js';
import { PatientProfileSchema } from '$lib/api/schemas.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';
import { getSecureStorage, STORAGE_KEYS, type SecureStorageProvider } from '$lib/utils/secure-storage.js';

const CachedProfileSchema: z.ZodType<CachedProfile, z.ZodTypeDef, unknown> = z.object({
	value: PatientProfileSchema,
	writtenAt: z.number()
});

export interface ProfileCacheOptions {
	storage?: SecureStorageProvider;
	ttlMs?: number;
	now?: () => number;
	logger?: Logger;
}

export class PersistentProfileCache {
	private readonly storage: SecureStorageProvider;
	private readonly ttlMs: number;
	private readonly now: () => number;
	private readonly log: Logger;

	constructor(options?: ProfileCacheOptions) {
		this.storage = options?.storage ?? getSecureStorage();
		this.ttlMs = options?.ttlMs ?? PROFILE_CACHE_TTL_MS;
		this.now = options?.now ?? Date.now;
		this.log = options?.logger ?? createLogger('profile-cache');
	}

	/** Stored profile, or null when missing, unreadable or corrupt */
	async read(): Promise<CachedProfile | null> {
		let raw: string | null;
		try {
			raw = await this.storage.get(STORAGE_KEYS.PATIENT_PROFILE);
		} catch (err) {
			this.log.warn('Error reading cached profile', err);
			return null;
		}
		if (raw === null) return null;

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (err) {
			this.log.warn('Cached profile is not valid JSON; treating as absent', err);
			return null;
		}

		const parsed = CachedProfileSchema.safeParse(json);
		if (!parsed.success) {
			this.log.warn('Cached profile has an unexpected shape; treating as absent');
			return null;
		}
		return parsed.data;
	}

	/** Overwrite the stored profile, stamped with the current time */
	async write(profile: PatientProfile): Promise<CachedProfile> {
		const cached: CachedProfile = { value: profile, writtenAt: this.now() };
		await this.storage.set(STORAGE_KEYS.PATIENT_PROFILE, JSON.stringify(cached));
		this.log.debug('Patient profile cached');
		return cached;
	}

	isValid(cached: CachedProfile, now?: number): boolean {
		const age = (now ?? this.now()) - cached.writtenAt;
		return age < this.ttlMs;
	}

	async clear(): Promise<void> {
		await this.storage.remove(STORAGE_KEYS.PATIENT_PROFILE);
		this.log.debug('Patient profile cache cleared');
	}
}
