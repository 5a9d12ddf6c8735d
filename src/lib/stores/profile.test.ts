// Profile cache + repository tests — TTL, corrupt records, stale fallback
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { get } from 'svelte/store';
import { PersistentProfileCache } from './profile-cache.js';
import { ProfileRepository } from './profile.js';
import { fetchFailure, type RemoteHealthDataSource } from '$lib/api/health-data.js';
import type { PatientProfile } from '$lib/types/profile.js';
import { silentLogger } from '$lib/utils/logger.js';
import { MemorySecureStorage, STORAGE_KEYS } from '$lib/utils/secure-storage.js';

const TTL = 5 * 60 * 1000;

function makeProfile(name = 'Test Patient'): PatientProfile {
	return {
		id: 'patient-1',
		user_id: 'user-1',
		name,
		age: 42,
		gender: 'female',
		blood_type: 'O+',
		contact: '555-0100',
		email: 'patient@example.com',
		address: '1 Test Street',
		family_contact: '555-0101',
		insurance_provider: null,
		insurance_id: null,
		emergency: false,
		occupation: 'Teacher'
	};
}

function makeSource(fetchProfile: RemoteHealthDataSource['fetchProfile']): RemoteHealthDataSource {
	return {
		fetchTodaySummary: vi.fn(),
		fetchAggregatedMetrics: vi.fn(),
		fetchPairedDevices: vi.fn(),
		fetchProfile,
		fetchSleepTrends: vi.fn(),
		fetchHeartRateTrends: vi.fn()
	};
}

describe('profile-cache', () => {
	let storage: MemorySecureStorage;
	let clock: number;
	let cache: PersistentProfileCache;

	beforeEach(() => {
		storage = new MemorySecureStorage();
		clock = 10_000;
		cache = new PersistentProfileCache({ storage, now: () => clock, logger: silentLogger });
	});

	it('returns null when nothing is stored', async () => {
		expect(await cache.read()).toBeNull();
	});

	it('round-trips a profile with its write time', async () => {
		await cache.write(makeProfile());
		expect(await cache.read()).toEqual({ value: makeProfile(), writtenAt: 10_000 });
	});

	it('is valid for five minutes', async () => {
		const cached = await cache.write(makeProfile());
		expect(cache.isValid(cached, 10_000 + TTL - 1)).toBe(true);
		expect(cache.isValid(cached, 10_000 + TTL)).toBe(false);
	});

	it('treats corrupt JSON as absent', async () => {
		await storage.set(STORAGE_KEYS.PATIENT_PROFILE, '{not json');
		expect(await cache.read()).toBeNull();
	});

	it('treats a record of the wrong shape as absent', async () => {
		await storage.set(STORAGE_KEYS.PATIENT_PROFILE, JSON.stringify({ value: { id: 1 }, writtenAt: 'x' }));
		expect(await cache.read()).toBeNull();
	});

	it('treats a storage read error as absent', async () => {
		vi.spyOn(storage, 'get').mockRejectedValue(new Error('disk gone'));
		expect(await cache.read()).toBeNull();
	});

	it('clear removes the record', async () => {
		await cache.write(makeProfile());
		await cache.clear();
		expect(storage.has(STORAGE_KEYS.PATIENT_PROFILE)).toBe(false);
	});
});

describe('profile repository', () => {
	let storage: MemorySecureStorage;
	let clock: number;
	let cache: PersistentProfileCache;

	beforeEach(() => {
		storage = new MemorySecureStorage();
		clock = 10_000;
		cache = new PersistentProfileCache({ storage, now: () => clock, logger: silentLogger });
	});

	it('serves a valid cached profile without the network', async () => {
		await cache.write(makeProfile('Cached'));
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>();
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result).toEqual({ ok: true, profile: makeProfile('Cached'), source: 'fresh_cache', error: null });
		expect(fetchProfile).not.toHaveBeenCalled();
		expect(get(repo.profile)?.name).toBe('Cached');
	});

	it('fetches and persists when the cache is empty', async () => {
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>().mockResolvedValue({
			ok: true,
			data: makeProfile('Fresh')
		});
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result).toEqual({ ok: true, profile: makeProfile('Fresh'), source: 'network', error: null });
		expect(fetchProfile).toHaveBeenCalledWith('patient-1', { signal: undefined });
		expect((await cache.read())?.value.name).toBe('Fresh');
	});

	it('fetches when the cached profile has expired', async () => {
		await cache.write(makeProfile('Old'));
		clock += TTL;
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>().mockResolvedValue({
			ok: true,
			data: makeProfile('New')
		});
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result.ok && result.source).toBe('network');
		expect((await cache.read())?.writtenAt).toBe(10_000 + TTL);
	});

	it('bypasses a valid cache on forceRefresh', async () => {
		await cache.write(makeProfile('Cached'));
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>().mockResolvedValue({
			ok: true,
			data: makeProfile('Forced')
		});
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1', { forceRefresh: true });

		expect(fetchProfile).toHaveBeenCalledTimes(1);
		expect(result.ok && result.profile.name).toBe('Forced');
	});

	it('prefers an expired profile over a failure', async () => {
		await cache.write(makeProfile('Stale'));
		clock += 60 * 60 * 1000;
		const fetchProfile = vi
			.fn<RemoteHealthDataSource['fetchProfile']>()
			.mockResolvedValue(fetchFailure('network', 'offline'));
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result).toEqual({ ok: true, profile: makeProfile('Stale'), source: 'stale_cache', error: 'offline' });
	});

	it('falls back to a stale profile when the source throws', async () => {
		await cache.write(makeProfile('Stale'));
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>().mockRejectedValue(new Error('boom'));
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1', { forceRefresh: true });

		expect(result).toEqual({ ok: true, profile: makeProfile('Stale'), source: 'stale_cache', error: 'boom' });
	});

	it('fails only when nothing was ever cached', async () => {
		const fetchProfile = vi
			.fn<RemoteHealthDataSource['fetchProfile']>()
			.mockResolvedValue(fetchFailure('rejected', 'Patient not found', 200));
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result).toEqual({ ok: false, error: 'Patient not found' });
		expect(get(repo.profile)).toBeNull();
	});

	it('still returns a fetched profile when persisting it fails', async () => {
		vi.spyOn(storage, 'set').mockRejectedValue(new Error('disk full'));
		const fetchProfile = vi.fn<RemoteHealthDataSource['fetchProfile']>().mockResolvedValue({
			ok: true,
			data: makeProfile()
		});
		const repo = new ProfileRepository(makeSource(fetchProfile), cache, silentLogger);

		const result = await repo.getProfile('patient-1');

		expect(result.ok && result.source).toBe('network');
	});

	it('clear forgets the profile everywhere', async () => {
		await cache.write(makeProfile());
		const repo = new ProfileRepository(makeSource(vi.fn()), cache, silentLogger);
		await repo.getProfile('patient-1');

		await repo.clear();

		expect(get(repo.profile)).toBeNull();
		expect(await cache.read()).toBeNull();
	});
});
