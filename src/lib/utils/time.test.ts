import { describe, it, expect, afterEach, vi } from 'vitest';
import { formatLastSync, sleep } from './time.js';

const NOW = 1_700_000_000_000;
const MINUTE = 60 * 1000;

describe('formatLastSync', () => {
	it.each([
		[null, 'Never'],
		[NOW - 30 * 1000, 'Just now'],
		[NOW - MINUTE, '1 min ago'],
		[NOW - 59 * MINUTE, '59 mins ago'],
		[NOW - 60 * MINUTE, '1 hour ago'],
		[NOW - 5 * 60 * MINUTE, '5 hours ago'],
		[NOW - 24 * 60 * MINUTE, '1 day ago'],
		[NOW - 3 * 24 * 60 * MINUTE, '3 days ago'],
		[NOW + 5 * MINUTE, 'Just now']
	])('%s → %s', (lastSyncAt, label) => {
		expect(formatLastSync(lastSyncAt, NOW)).toBe(label);
	});
});

describe('sleep', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('resolves after the delay', async () => {
		vi.useFakeTimers();
		const done = vi.fn();
		void sleep(50).then(done);

		await vi.advanceTimersByTimeAsync(49);
		expect(done).not.toHaveBeenCalled();
		await vi.advanceTimersByTimeAsync(1);
		expect(done).toHaveBeenCalledTimes(1);
	});

	it('resolves early when aborted', async () => {
		vi.useFakeTimers();
		const controller = new AbortController();
		const done = vi.fn();
		void sleep(10_000, controller.signal).then(done);

		controller.abort();
		await vi.advanceTimersByTimeAsync(0);

		expect(done).toHaveBeenCalledTimes(1);
		expect(vi.getTimerCount()).toBe(0);
	});
});
