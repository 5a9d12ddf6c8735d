// REST client for the health backend — auth header, timeouts, tagged error mapping
import { secureGet, STORAGE_KEYS } from '$lib/utils/secure-storage.js';

/** Default per-request timeout (mobile network conditions) */
export const REQUEST_TIMEOUT_MS = 30_000;

/** API client configuration */
export interface ApiClientConfig {
	/** e.g. https://api.example.com/api/v1 (no trailing slash) */
	baseUrl: string;
	sessionToken: string;
	timeoutMs?: number;
}

export type ApiErrorKind = 'not_configured' | 'network' | 'timeout' | 'aborted' | 'http' | 'decode';

/** HTTP response wrapper; failures are values, never thrown */
export type ApiResponse<T> =
	| { ok: true; status: number; data: T }
	| { ok: false; status: number; kind: ApiErrorKind; error: string };

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
	query?: QueryParams;
	signal?: AbortSignal;
}

function buildQuery(query: QueryParams | undefined): string {
	if (!query) return '';
	const params = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		if (value !== undefined) params.set(key, String(value));
	}
	const encoded = params.toString();
	return encoded ? `?${encoded}` : '';
}

/**
 * Health backend client. Handles the bearer header, the request timeout and
 * maps every transport outcome to an `ApiResponse`.
 */
export class HealthApiClient {
	private config: ApiClientConfig | null = null;

	/** Initialize with connection details from sign-in */
	configure(config: ApiClientConfig): void {
		this.config = config;
	}

	/** Check if client is configured */
	get isConfigured(): boolean {
		return this.config !== null;
	}

	/** Load configuration from secure storage */
	async loadFromStorage(): Promise<boolean> {
		const baseUrl = await secureGet(STORAGE_KEYS.API_BASE_URL);
		const token = await secureGet(STORAGE_KEYS.SESSION_TOKEN);

		if (!baseUrl || !token) return false;

		this.config = { baseUrl, sessionToken: token };
		return true;
	}

	/** Make an authenticated GET request */
	async get(path: string, options?: RequestOptions): Promise<ApiResponse<unknown>> {
		return this.request('GET', path, options);
	}

	private async request(
		method: string,
		path: string,
		options?: RequestOptions
	): Promise<ApiResponse<unknown>> {
		if (!this.config) {
			return { ok: false, status: 0, kind: 'not_configured', error: 'Client not configured' };
		}

		const external = options?.signal;
		if (external?.aborted) {
			return { ok: false, status: 0, kind: 'aborted', error: 'Request aborted' };
		}

		const url = `${this.config.baseUrl}${path}${buildQuery(options?.query)}`;
		const controller = new AbortController();
		let timedOut = false;
		const timeoutMs = this.config.timeoutMs ?? REQUEST_TIMEOUT_MS;
		const timeoutId = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, timeoutMs);
		const forwardAbort = () => controller.abort();
		external?.addEventListener('abort', forwardAbort, { once: true });

		try {
			const response = await fetch(url, {
				method,
				headers: {
					'Accept': 'application/json',
					'Authorization': `Bearer ${this.config.sessionToken}`
				},
				signal: controller.signal
			});

			if (!response.ok) {
				const errorText = await response.text().catch(() => '');
				return {
					ok: false,
					status: response.status,
					kind: 'http',
					error: errorText ? `HTTP ${response.status}: ${errorText}` : `HTTP ${response.status}`
				};
			}

			try {
				const data: unknown = await response.json();
				return { ok: true, status: response.status, data };
			} catch {
				return { ok: false, status: response.status, kind: 'decode', error: 'Malformed JSON response' };
			}
		} catch (err) {
			if (external?.aborted) {
				return { ok: false, status: 0, kind: 'aborted', error: 'Request aborted' };
			}
			if (timedOut) {
				return { ok: false, status: 0, kind: 'timeout', error: `Request timed out after ${timeoutMs}ms` };
			}
			const message = err instanceof Error ? err.message : 'Network error';
			return { ok: false, status: 0, kind: 'network', error: message };
		} finally {
			clearTimeout(timeoutId);
			external?.removeEventListener('abort', forwardAbort);
		}
	}

	/** Drop credentials (logout) */
	destroy(): void {
		this.config = null;
	}
}
