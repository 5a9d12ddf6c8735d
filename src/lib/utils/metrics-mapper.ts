// Metrics mapper — pure transforms from backend payloads to wearables screen values
import type {
	HealthInsight,
	HealthSummary,
	HeartRateStatus,
	HeartRateTrendDataPoint,
	HeartRateTrendPoint,
	SleepTrendDataPoint,
	SleepTrendPoint,
	TodaySummary
} from '$lib/types/metrics.js';
import { BASELINE_BPM, CALORIES_GOAL } from '$lib/types/metrics.js';

const INTEGER_PATTERN = /^-?\d+$/;

/** "+12%" → 12, "-4%" → -4; absent or unparsable → 0 */
export function parseChangePercentage(change: string | null | undefined): number {
	if (change == null) return 0;
	const digits = change.replace(/%/g, '').replace(/\+/g, '');
	if (!INTEGER_PATTERN.test(digits)) return 0;
	const parsed = Number.parseInt(digits, 10);
	return Number.isSafeInteger(parsed) ? parsed : 0;
}

/** 12 → "+12%", -3 → "-3%", 0 → "0%" */
export function formatChange(change: number | null | undefined): string {
	if (change == null || change === 0) return '0%';
	return change > 0 ? `+${change}%` : `${change}%`;
}

export function classifyHeartRate(bpm: number): HeartRateStatus {
	if (bpm === 0) return 'No data';
	if (bpm < 60) return 'Low';
	if (bpm > 100) return 'Elevated';
	return 'Normal';
}

export function caloriesPercentage(total: number, goal: number): number {
	if (goal <= 0) return 0;
	return Math.round((total / goal) * 100);
}

/** Signed distance from the 72 BPM chart baseline */
export function baselineOffset(bpm: number): number {
	return bpm - BASELINE_BPM;
}

/** Percentage of time in bed spent asleep; 0 when nothing was recorded */
export function sleepEfficiency(timeInBed: number, timeAsleep: number): number {
	if (timeInBed <= 0) return 0;
	return (timeAsleep / timeInBed) * 100;
}

function wholeNumber(value: number | null | undefined): number {
	return value == null ? 0 : Math.trunc(value);
}

export function mapToHealthSummary(
	summary: TodaySummary,
	caloriesGoal: number = CALORIES_GOAL
): HealthSummary {
	const heartRate = wholeNumber(summary.heart_rate.avg);
	const calories = wholeNumber(summary.calories.total);
	const sleepTimeAsleep = summary.sleep?.time_asleep ?? 0;

	return {
		steps: wholeNumber(summary.steps.total),
		stepsChange: parseChangePercentage(summary.steps.change),
		heartRate,
		heartRateStatus: classifyHeartRate(heartRate),
		// Time asleep, not time in bed, is what the screen calls "sleep"
		sleepHours: sleepTimeAsleep,
		sleepChange: parseChangePercentage(summary.sleep?.change),
		sleepTimeInBed: summary.sleep?.time_in_bed ?? 0,
		sleepTimeAsleep,
		sleepStages: summary.sleep?.stages ?? null,
		sleepSessionCount: summary.sleep?.sessions?.length ?? 0,
		calories,
		caloriesGoal,
		caloriesPercentage: caloriesPercentage(calories, caloriesGoal)
	};
}

export function generateInsights(summary: HealthSummary): HealthInsight[] {
	return [
		{
			id: 1,
			type: 'steps',
			title: summary.stepsChange >= 0 ? 'Steps trending up' : 'Steps dipped today',
			value: `${summary.steps} steps`,
			subtitle: `vs yesterday ${formatChange(summary.stepsChange)}`,
			trend: formatChange(summary.stepsChange)
		},
		{
			id: 2,
			type: 'heart_rate',
			title: `Heart rate ${summary.heartRateStatus}`,
			value: `${summary.heartRate} bpm avg`,
			subtitle: summary.heartRateStatus
		},
		{
			id: 3,
			type: 'sleep',
			title: 'Sleep duration',
			value: `${summary.sleepHours.toFixed(1)} h`,
			subtitle: `vs yesterday ${formatChange(summary.sleepChange)}`,
			trend: formatChange(summary.sleepChange)
		},
		{
			id: 4,
			type: 'calories',
			title: 'Calories goal',
			value: `${summary.calories}/${summary.caloriesGoal} kcal`,
			subtitle: `${summary.caloriesPercentage}% of goal`
		}
	];
}

export function toHeartRateTrend(points: readonly HeartRateTrendDataPoint[]): HeartRateTrendPoint[] {
	return points.map((p) => ({
		date: p.date,
		bpm: p.bpm,
		minBpm: p.min_bpm,
		maxBpm: p.max_bpm,
		baselineOffset: baselineOffset(p.bpm)
	}));
}

export function toSleepTrend(points: readonly SleepTrendDataPoint[]): SleepTrendPoint[] {
	return points.map((p) => ({
		date: p.date,
		timeInBed: p.time_in_bed,
		timeAsleep: p.time_asleep,
		efficiency: sleepEfficiency(p.time_in_bed, p.time_asleep)
	}));
}

/** Shown when there is neither network data nor a cached summary */
export const STATIC_DEFAULT_SUMMARY: Readonly<HealthSummary> = Object.freeze({
	steps: 0,
	stepsChange: 0,
	heartRate: 0,
	heartRateStatus: 'No data',
	sleepHours: 0,
	sleepChange: 0,
	sleepTimeInBed: 0,
	sleepTimeAsleep: 0,
	sleepStages: null,
	sleepSessionCount: 0,
	calories: 0,
	caloriesGoal: CALORIES_GOAL,
	caloriesPercentage: 0
});
