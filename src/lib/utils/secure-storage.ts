// Key/value storage — provider interface plus the in-memory implementation

/** Provider interface for durable key/value storage (mockable in tests) */
export interface SecureStorageProvider {
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<void>;
	remove(key: string): Promise<void>;
}

/** Well-known storage keys */
export const STORAGE_KEYS = {
	API_BASE_URL: 'api_base_url',
	SESSION_TOKEN: 'session_token',
	PATIENT_ID: 'patient_id',
	DEVICE_OWNER_ID: 'device_owner_id',
	PATIENT_PROFILE: 'patient_profile_cache'
} as const;

/** In-memory implementation for testing */
export class MemorySecureStorage implements SecureStorageProvider {
	private store = new Map<string, string>();

	async get(key: string): Promise<string | null> {
		return this.store.get(key) ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		this.store.set(key, value);
	}

	async remove(key: string): Promise<void> {
		this.store.delete(key);
	}

	has(key: string): boolean {
		return this.store.has(key);
	}
}

/** Active storage provider (set during app initialization) */
let activeProvider: SecureStorageProvider = new MemorySecureStorage();

/** Initialize with a durable provider */
export function initSecureStorage(provider: SecureStorageProvider): void {
	activeProvider = provider;
}

/** Provider currently in use */
export function getSecureStorage(): SecureStorageProvider {
	return activeProvider;
}

/** Get a value from secure storage */
export async function secureGet(key: string): Promise<string | null> {
	return activeProvider.get(key);
}
