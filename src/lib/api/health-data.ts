// Health data source — typed wearables/profile operations over the REST client
import type { z } from 'zod';
import type {
	AggregatedMetricsResponse,
	AggregationPeriod,
	HeartRateTrendsResponse,
	SleepTrendsResponse,
	TodaySummaryResponse,
	WearableDevice
} from '$lib/types/metrics.js';
import type { PatientProfile } from '$lib/types/profile.js';
import { createLogger, type Logger } from '$lib/utils/logger.js';
import type { ApiErrorKind, HealthApiClient, QueryParams } from './client.js';
import {
	AggregatedMetricsResponseSchema,
	HeartRateTrendsResponseSchema,
	PatientProfileResponseSchema,
	SleepTrendsResponseSchema,
	TodaySummaryResponseSchema,
	WearableDeviceListSchema,
	describeIssues
} from './schemas.js';

/** `rejected`: the backend answered but refused (success=false) */
export type FetchErrorKind = ApiErrorKind | 'rejected';

export interface FetchError {
	kind: FetchErrorKind;
	message: string;
	/** HTTP status, 0 when no response arrived */
	status: number;
}

export type FetchResult<T> = { ok: true; data: T } | { ok: false; error: FetchError };

export interface FetchOptions {
	signal?: AbortSignal;
}

/** Network operations the sync engine consumes. Implementations never throw. */
export interface RemoteHealthDataSource {
	fetchTodaySummary(patientId: string, options?: FetchOptions): Promise<FetchResult<TodaySummaryResponse>>;
	fetchAggregatedMetrics(
		patientId: string,
		period: AggregationPeriod,
		days: number,
		options?: FetchOptions
	): Promise<FetchResult<AggregatedMetricsResponse>>;
	fetchPairedDevices(androidUserId: string, options?: FetchOptions): Promise<FetchResult<WearableDevice[]>>;
	fetchProfile(patientId: string, options?: FetchOptions): Promise<FetchResult<PatientProfile>>;
	fetchSleepTrends(patientId: string, days: number, options?: FetchOptions): Promise<FetchResult<SleepTrendsResponse>>;
	fetchHeartRateTrends(
		patientId: string,
		days: number,
		options?: FetchOptions
	): Promise<FetchResult<HeartRateTrendsResponse>>;
}

export function fetchFailure(kind: FetchErrorKind, message: string, status = 0): { ok: false; error: FetchError } {
	return { ok: false, error: { kind, message, status } };
}

/** REST implementation against the wearables backend */
export class HttpHealthDataSource implements RemoteHealthDataSource {
	private readonly log: Logger;

	constructor(
		private readonly client: HealthApiClient,
		logger?: Logger
	) {
		this.log = logger ?? createLogger('health-data');
	}

	async fetchTodaySummary(patientId: string, options?: FetchOptions): Promise<FetchResult<TodaySummaryResponse>> {
		const result = await this.getDecoded(
			'/wearables/summary/today',
			{ patient_id: patientId },
			TodaySummaryResponseSchema,
			options
		);
		if (result.ok) this.log.debug(`Fetched today's summary for ${result.data.date}`);
		return result;
	}

	async fetchAggregatedMetrics(
		patientId: string,
		period: AggregationPeriod,
		days: number,
		options?: FetchOptions
	): Promise<FetchResult<AggregatedMetricsResponse>> {
		return this.getDecoded(
			'/wearables/metrics/aggregated',
			{ patient_id: patientId, period, days },
			AggregatedMetricsResponseSchema,
			options
		);
	}

	async fetchPairedDevices(androidUserId: string, options?: FetchOptions): Promise<FetchResult<WearableDevice[]>> {
		const result = await this.getDecoded(
			'/wearables/devices/paired',
			{ android_user_id: androidUserId },
			WearableDeviceListSchema,
			options
		);
		if (result.ok) this.log.debug(`Fetched ${result.data.length} paired device(s)`);
		return result;
	}

	async fetchProfile(patientId: string, options?: FetchOptions): Promise<FetchResult<PatientProfile>> {
		const result = await this.getDecoded(
			`/patients/${encodeURIComponent(patientId)}/profile`,
			undefined,
			PatientProfileResponseSchema,
			options
		);
		if (!result.ok) return result;

		const { success, patient, message } = result.data;
		if (!success || !patient) {
			return fetchFailure('rejected', message ?? 'Failed to fetch patient profile', 200);
		}
		return { ok: true, data: patient };
	}

	async fetchSleepTrends(
		patientId: string,
		days: number,
		options?: FetchOptions
	): Promise<FetchResult<SleepTrendsResponse>> {
		return this.getDecoded(
			'/wearables/metrics/sleep-trends',
			{ patient_id: patientId, days },
			SleepTrendsResponseSchema,
			options
		);
	}

	async fetchHeartRateTrends(
		patientId: string,
		days: number,
		options?: FetchOptions
	): Promise<FetchResult<HeartRateTrendsResponse>> {
		return this.getDecoded(
			'/wearables/metrics/heart-rate-trends',
			{ patient_id: patientId, days },
			HeartRateTrendsResponseSchema,
			options
		);
	}

	private async getDecoded<T>(
		path: string,
		query: QueryParams | undefined,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		options?: FetchOptions
	): Promise<FetchResult<T>> {
		const response = await this.client.get(path, { query, signal: options?.signal });
		if (!response.ok) {
			if (response.kind !== 'aborted') {
				this.log.error(`GET ${path} failed (${response.kind})`, response.error);
			}
			return fetchFailure(response.kind, response.error, response.status);
		}

		const parsed = schema.safeParse(response.data);
		if (!parsed.success) {
			const message = `Unexpected response from ${path}: ${describeIssues(parsed.error)}`;
			this.log.error(message);
			return fetchFailure('decode', message, response.status);
		}
		return { ok: true, data: parsed.data };
	}
}
