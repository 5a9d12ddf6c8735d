// Health metrics types — backend payloads (snake_case) and UI aggregates (camelCase)

// === BACKEND PAYLOADS ===

/** Summary statistics for a single metric */
export interface MetricSummary {
	total?: number | null;
	avg?: number | null;
	min?: number | null;
	max?: number | null;
	/** Day-over-day change, e.g. "+12%" */
	change?: string | null;
	unit?: string | null;
	count?: number | null;
	// Sleep only
	time_in_bed?: number | null;
	time_asleep?: number | null;
	stages?: SleepStages | null;
	sessions?: SleepSession[] | null;
}

/** Sleep stage breakdown in hours */
export interface SleepStages {
	awake: number;
	rem: number;
	core: number;
	deep: number;
}

export interface SleepSession {
	start_time: string;
	end_time: string;
	in_bed_hours?: number | null;
	asleep_hours?: number | null;
	stages?: SleepStages | null;
}

export interface TodaySummary {
	steps: MetricSummary;
	heart_rate: MetricSummary;
	calories: MetricSummary;
	distance?: MetricSummary | null;
	flights_climbed?: MetricSummary | null;
	sleep?: MetricSummary | null;
	resting_heart_rate?: MetricSummary | null;
	vo2_max?: MetricSummary | null;
}

export interface TodaySummaryResponse {
	patient_id: string;
	date: string;
	summary: TodaySummary;
}

export type AggregationPeriod = 'hourly' | 'daily' | 'weekly';

export interface AggregatedDataPoint {
	date: string;
	total: number;
	avg: number;
	min: number;
	max: number;
	count: number;
}

export interface AggregatedMetricsResponse {
	patient_id: string;
	period: AggregationPeriod;
	days: number;
	/** Keyed by metric type ("steps", "calories", "distance", ...) */
	metrics: Record<string, AggregatedDataPoint[]>;
}

export interface WearableDevice {
	id: string;
	patient_id: string;
	name: string | null;
	type: string | null;
	device_id: string;
	is_connected: boolean;
	battery_level: number;
	last_sync_time: string | null;
	data_points_synced: number;
	created_at: string;
}

export interface SleepTrendDataPoint {
	date: string;
	time_in_bed: number;
	time_asleep: number;
}

export interface SleepTrendsResponse {
	patient_id: string;
	days: number;
	data: SleepTrendDataPoint[];
}

export interface HeartRateTrendDataPoint {
	date: string;
	bpm: number;
	min_bpm: number;
	max_bpm: number;
}

export interface HeartRateTrendsResponse {
	patient_id: string;
	days: number;
	data: HeartRateTrendDataPoint[];
}

// === UI AGGREGATES ===

export type HeartRateStatus = 'No data' | 'Low' | 'Normal' | 'Elevated';

export interface HealthSummary {
	steps: number;
	stepsChange: number;
	heartRate: number;
	heartRateStatus: HeartRateStatus;
	sleepHours: number;
	sleepChange: number;
	sleepTimeInBed: number;
	sleepTimeAsleep: number;
	sleepStages: SleepStages | null;
	sleepSessionCount: number;
	calories: number;
	caloriesGoal: number;
	caloriesPercentage: number;
}

export type InsightType = 'steps' | 'heart_rate' | 'sleep' | 'calories';

export interface HealthInsight {
	id: number;
	type: InsightType;
	title: string;
	value: string;
	subtitle: string;
	trend?: string;
}

/** Point on the suspended-bar heart rate chart (centered on the baseline) */
export interface HeartRateTrendPoint {
	date: string;
	bpm: number;
	minBpm: number;
	maxBpm: number;
	baselineOffset: number;
}

export interface SleepTrendPoint {
	date: string;
	timeInBed: number;
	timeAsleep: number;
	efficiency: number;
}

// === CONSTANTS ===

/** Resting heart rate reference used as the chart's zero line */
export const BASELINE_BPM = 72.0;

/** Daily active calories goal */
export const CALORIES_GOAL = 2000;
