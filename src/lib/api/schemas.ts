// Response schemas — decode backend JSON into typed payloads
import { z } from 'zod';
import type {
	AggregatedDataPoint,
	AggregatedMetricsResponse,
	HeartRateTrendsResponse,
	MetricSummary,
	SleepSession,
	SleepStages,
	SleepTrendsResponse,
	TodaySummaryResponse,
	WearableDevice
} from '$lib/types/metrics.js';
import type { PatientProfile, PatientProfileResponse } from '$lib/types/profile.js';

/** Schema whose output is pinned to a domain type */
type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const nullableNumber = z.number().nullish();

export const SleepStagesSchema: Schema<SleepStages> = z.object({
	awake: z.number().default(0),
	rem: z.number().default(0),
	core: z.number().default(0),
	deep: z.number().default(0)
});

export const SleepSessionSchema: Schema<SleepSession> = z.object({
	start_time: z.string(),
	end_time: z.string(),
	in_bed_hours: nullableNumber,
	asleep_hours: nullableNumber,
	stages: SleepStagesSchema.nullish()
});

export const MetricSummarySchema: Schema<MetricSummary> = z.object({
	total: nullableNumber,
	avg: nullableNumber,
	min: nullableNumber,
	max: nullableNumber,
	change: z.string().nullish(),
	unit: z.string().nullish(),
	count: nullableNumber,
	time_in_bed: nullableNumber,
	time_asleep: nullableNumber,
	stages: SleepStagesSchema.nullish(),
	sessions: z.array(SleepSessionSchema).nullish()
});

export const TodaySummaryResponseSchema: Schema<TodaySummaryResponse> = z.object({
	patient_id: z.string(),
	date: z.string(),
	summary: z.object({
		steps: MetricSummarySchema,
		heart_rate: MetricSummarySchema,
		calories: MetricSummarySchema,
		distance: MetricSummarySchema.nullish(),
		flights_climbed: MetricSummarySchema.nullish(),
		sleep: MetricSummarySchema.nullish(),
		resting_heart_rate: MetricSummarySchema.nullish(),
		vo2_max: MetricSummarySchema.nullish()
	})
});

export const AggregationPeriodSchema = z.enum(['hourly', 'daily', 'weekly']);

export const AggregatedDataPointSchema: Schema<AggregatedDataPoint> = z.object({
	date: z.string(),
	total: z.number(),
	avg: z.number(),
	min: z.number(),
	max: z.number(),
	count: z.number().int()
});

export const AggregatedMetricsResponseSchema: Schema<AggregatedMetricsResponse> = z.object({
	patient_id: z.string(),
	period: AggregationPeriodSchema,
	days: z.number().int(),
	metrics: z.record(z.string(), z.array(AggregatedDataPointSchema))
});

export const WearableDeviceSchema: Schema<WearableDevice> = z.object({
	id: z.string(),
	patient_id: z.string(),
	name: z.string().nullable().default(null),
	type: z.string().nullable().default(null),
	device_id: z.string(),
	is_connected: z.boolean(),
	battery_level: z.number(),
	last_sync_time: z.string().nullable().default(null),
	data_points_synced: z.number(),
	created_at: z.string()
});

export const WearableDeviceListSchema: Schema<WearableDevice[]> = z.array(WearableDeviceSchema);

export const SleepTrendsResponseSchema: Schema<SleepTrendsResponse> = z.object({
	patient_id: z.string(),
	days: z.number().int(),
	data: z.array(
		z.object({
			date: z.string(),
			time_in_bed: z.number(),
			time_asleep: z.number()
		})
	)
});

export const HeartRateTrendsResponseSchema: Schema<HeartRateTrendsResponse> = z.object({
	patient_id: z.string(),
	days: z.number().int(),
	data: z.array(
		z.object({
			date: z.string(),
			bpm: z.number(),
			min_bpm: z.number(),
			max_bpm: z.number()
		})
	)
});

export const PatientProfileSchema: Schema<PatientProfile> = z.object({
	id: z.string(),
	user_id: z.string(),
	name: z.string(),
	age: z.number().int(),
	gender: z.string(),
	blood_type: z.string(),
	contact: z.string(),
	email: z.string(),
	address: z.string(),
	family_contact: z.string(),
	insurance_provider: z.string().nullable().default(null),
	insurance_id: z.string().nullable().default(null),
	emergency: z.boolean(),
	occupation: z.string().nullable().default(null)
});

export const PatientProfileResponseSchema: Schema<PatientProfileResponse> = z.object({
	success: z.boolean(),
	patient: PatientProfileSchema.nullable().default(null),
	message: z.string().nullable().default(null)
});

/** Flatten zod issues into one line for logs and view errors */
export function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ');
}
