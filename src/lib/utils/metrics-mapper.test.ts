// Metrics mapper tests — change parsing, heart rate bands, calories, sleep, insights
import { describe, it, expect } from 'vitest';
import {
	parseChangePercentage,
	formatChange,
	classifyHeartRate,
	caloriesPercentage,
	baselineOffset,
	sleepEfficiency,
	mapToHealthSummary,
	generateInsights,
	toHeartRateTrend,
	toSleepTrend,
	STATIC_DEFAULT_SUMMARY
} from './metrics-mapper.js';
import type { TodaySummary } from '$lib/types/metrics.js';

function makeSummary(overrides: Partial<TodaySummary> = {}): TodaySummary {
	return {
		steps: { total: 4932, change: '+12%' },
		heart_rate: { avg: 74.6, min: 58, max: 121 },
		calories: { total: 1877 },
		sleep: {
			time_in_bed: 8,
			time_asleep: 7.25,
			change: '-4%',
			stages: { awake: 0.75, rem: 1.5, core: 4, deep: 1.75 },
			sessions: [{ start_time: '2026-03-01T23:00:00Z', end_time: '2026-03-02T07:00:00Z' }]
		},
		...overrides
	};
}

describe('metrics-mapper — parseChangePercentage', () => {
	it('parses signed percentages', () => {
		expect(parseChangePercentage('+12%')).toBe(12);
		expect(parseChangePercentage('-4%')).toBe(-4);
		expect(parseChangePercentage('7%')).toBe(7);
	});

	it('returns 0 for absent or unparsable input', () => {
		expect(parseChangePercentage(null)).toBe(0);
		expect(parseChangePercentage(undefined)).toBe(0);
		expect(parseChangePercentage('abc%')).toBe(0);
		expect(parseChangePercentage('')).toBe(0);
		expect(parseChangePercentage('1.5%')).toBe(0);
	});
});

describe('metrics-mapper — formatChange', () => {
	it('adds a plus sign to gains only', () => {
		expect(formatChange(5)).toBe('+5%');
		expect(formatChange(-3)).toBe('-3%');
		expect(formatChange(0)).toBe('0%');
		expect(formatChange(null)).toBe('0%');
	});
});

describe('metrics-mapper — classifyHeartRate', () => {
	it('maps bpm to the status bands', () => {
		expect(classifyHeartRate(0)).toBe('No data');
		expect(classifyHeartRate(59)).toBe('Low');
		expect(classifyHeartRate(60)).toBe('Normal');
		expect(classifyHeartRate(100)).toBe('Normal');
		expect(classifyHeartRate(101)).toBe('Elevated');
	});
});

describe('metrics-mapper — numeric helpers', () => {
	it('rounds the calories percentage', () => {
		expect(caloriesPercentage(1877, 2000)).toBe(94);
		expect(caloriesPercentage(2500, 2000)).toBe(125);
		expect(caloriesPercentage(500, 0)).toBe(0);
	});

	it('measures distance from the 72 bpm baseline', () => {
		expect(baselineOffset(80)).toBe(8);
		expect(baselineOffset(60)).toBe(-12);
		expect(baselineOffset(72)).toBe(0);
	});

	it('computes sleep efficiency', () => {
		expect(sleepEfficiency(8, 6)).toBe(75);
		expect(sleepEfficiency(0, 6)).toBe(0);
	});
});

describe('metrics-mapper — mapToHealthSummary', () => {
	it('maps a full summary with the default goal', () => {
		const summary = mapToHealthSummary(makeSummary());

		expect(summary.steps).toBe(4932);
		expect(summary.stepsChange).toBe(12);
		expect(summary.heartRate).toBe(74);
		expect(summary.heartRateStatus).toBe('Normal');
		expect(summary.calories).toBe(1877);
		expect(summary.caloriesGoal).toBe(2000);
		expect(summary.caloriesPercentage).toBe(94);
		expect(summary.sleepHours).toBe(7.25);
		expect(summary.sleepChange).toBe(-4);
		expect(summary.sleepTimeInBed).toBe(8);
		expect(summary.sleepStages).toEqual({ awake: 0.75, rem: 1.5, core: 4, deep: 1.75 });
		expect(summary.sleepSessionCount).toBe(1);
	});

	it('treats missing metrics as zero', () => {
		const summary = mapToHealthSummary({ steps: {}, heart_rate: {}, calories: {} }, 2500);

		expect(summary.steps).toBe(0);
		expect(summary.heartRateStatus).toBe('No data');
		expect(summary.sleepHours).toBe(0);
		expect(summary.sleepStages).toBeNull();
		expect(summary.caloriesGoal).toBe(2500);
		expect(summary.caloriesPercentage).toBe(0);
	});
});

describe('metrics-mapper — generateInsights', () => {
	it('builds the four insight cards', () => {
		const insights = generateInsights(mapToHealthSummary(makeSummary()));

		expect(insights.map((i) => i.type)).toEqual(['steps', 'heart_rate', 'sleep', 'calories']);
		expect(insights[0]).toEqual({
			id: 1,
			type: 'steps',
			title: 'Steps trending up',
			value: '4932 steps',
			subtitle: 'vs yesterday +12%',
			trend: '+12%'
		});
		expect(insights[1].title).toBe('Heart rate Normal');
		expect(insights[1].value).toBe('74 bpm avg');
		expect(insights[2].value).toBe('7.3 h');
		expect(insights[2].trend).toBe('-4%');
		expect(insights[3].value).toBe('1877/2000 kcal');
		expect(insights[3].subtitle).toBe('94% of goal');
	});

	it('reports a dip when steps fell', () => {
		const insights = generateInsights(
			mapToHealthSummary(makeSummary({ steps: { total: 1200, change: '-30%' } }))
		);
		expect(insights[0].title).toBe('Steps dipped today');
	});
});

describe('metrics-mapper — trends', () => {
	it('adds baseline offsets to heart rate points', () => {
		const points = toHeartRateTrend([{ date: '2026-03-01', bpm: 80, min_bpm: 55, max_bpm: 130 }]);
		expect(points).toEqual([{ date: '2026-03-01', bpm: 80, minBpm: 55, maxBpm: 130, baselineOffset: 8 }]);
	});

	it('adds efficiency to sleep points', () => {
		const points = toSleepTrend([{ date: '2026-03-01', time_in_bed: 8, time_asleep: 6 }]);
		expect(points).toEqual([{ date: '2026-03-01', timeInBed: 8, timeAsleep: 6, efficiency: 75 }]);
	});
});

describe('metrics-mapper — static default', () => {
	it('is an all-zero, frozen summary', () => {
		expect(STATIC_DEFAULT_SUMMARY.steps).toBe(0);
		expect(STATIC_DEFAULT_SUMMARY.heartRateStatus).toBe('No data');
		expect(STATIC_DEFAULT_SUMMARY.caloriesGoal).toBe(2000);
		expect(Object.isFrozen(STATIC_DEFAULT_SUMMARY)).toBe(true);
	});
});
