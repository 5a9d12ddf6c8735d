// Health session — builds the sync engine at sign-in, tears it down at logout
import { HealthApiClient } from '$lib/api/client.js';
import { HttpHealthDataSource, type RemoteHealthDataSource } from '$lib/api/health-data.js';
import { loadSyncConfig, resolveSyncConfig, type SyncConfig, type SyncConfigInput } from '$lib/config.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';
import { getSecureStorage, type SecureStorageProvider } from '$lib/utils/secure-storage.js';
import type { Sleep } from '$lib/utils/time.js';
import { createMetricsCache, type MetricsCache } from './metrics-cache.js';
import { PersistentProfileCache } from './profile-cache.js';
import { ProfileRepository } from './profile.js';
import { SyncOrchestrator } from './sync.js';

export interface HealthSessionOptions {
	config: SyncConfigInput;
	/** Defaults to the REST source over `client` */
	source?: RemoteHealthDataSource;
	client?: HealthApiClient;
	storage?: SecureStorageProvider;
	logger?: Logger;
	now?: () => number;
	sleep?: Sleep;
}

export interface HealthSession {
	readonly config: SyncConfig;
	readonly cache: MetricsCache;
	readonly sync: SyncOrchestrator;
	readonly profiles: ProfileRepository;
	readonly profileCache: PersistentProfileCache;
	readonly client: HealthApiClient | null;
}

const log = createLogger('session');

/** One engine per signed-in patient; nothing is shared across sessions */
export function createHealthSession(options: HealthSessionOptions): HealthSession {
	const config = resolveSyncConfig(options.config);
	let client = options.client ?? null;
	let source = options.source;
	if (!source) {
		client = client ?? new HealthApiClient();
		source = new HttpHealthDataSource(client, options.logger);
	}

	const cache = createMetricsCache({ now: options.now, logger: options.logger });
	const profileCache = new PersistentProfileCache({
		storage: options.storage ?? getSecureStorage(),
		now: options.now,
		logger: options.logger
	});
	const profiles = new ProfileRepository(source, profileCache, options.logger);
	const sync = new SyncOrchestrator({
		cache,
		source,
		config,
		logger: options.logger,
		now: options.now,
		sleep: options.sleep
	});

	log.info(`Session started for patient ${config.patientId}`);
	return { config, cache, sync, profiles, profileCache, client };
}

/**
 * Restore a session from credentials kept in secure storage.
 * Returns null when the user is signed out.
 */
export async function restoreHealthSession(
	options?: Omit<HealthSessionOptions, 'config'> & { config?: Partial<SyncConfigInput> }
): Promise<HealthSession | null> {
	const config = await loadSyncConfig(options?.config);
	if (!config) return null;

	const client = options?.client ?? new HealthApiClient();
	if (!options?.source && !client.isConfigured && !(await client.loadFromStorage())) {
		log.warn('Stored patient id without API credentials; staying signed out');
		return null;
	}
	return createHealthSession({ ...options, config, client });
}

/** Logout: stop all sync work and forget every cached record */
export async function endSession(session: HealthSession): Promise<void> {
	session.sync.dispose();
	session.cache.clearAll();
	try {
		await session.profiles.clear();
	} finally {
		session.client?.destroy();
		log.info('Session ended');
	}
}
