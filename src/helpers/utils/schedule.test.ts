import type { Redis } from 'ioredis';
import { scheduleJob, type Job } from 'node-schedule';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { useRedis } from '../../redis/index.js';
import { MemoryRedis } from '../../redis/testing/memory-redis.js';
import { scheduleLocalJob, scheduleSynchronizedJob } from './schedule.js';

vi.mock('node-schedule');
vi.mock('../../redis/index.js');

type FireCallback = (fireDate: Date) => void;

const isFireCallback = (value: unknown): value is FireCallback => typeof value === 'function';

let redis: MemoryRedis;
let callbacks: FireCallback[];
const cancel = vi.fn();

const flush = () => new Promise((resolve) => setImmediate(resolve));

beforeEach(() => {
	vi.clearAllMocks();
	redis = new MemoryRedis();
	callbacks = [];
	vi.mocked(useRedis).mockReturnValue(redis as unknown as Redis);

	vi.mocked(scheduleJob).mockImplementation((...args: unknown[]) => {
		const callback = args[2];
		if (isFireCallback(callback)) callbacks.push(callback);
		return { cancel } as unknown as Job;
	});
});

describe('scheduleSynchronizedJob', () => {
	test('Runs a firing on one instance only', async () => {
		const first = vi.fn(() => Promise.resolve());
		const second = vi.fn(() => Promise.resolve());
		const fireDate = new Date('2025-07-01T06:00:00Z');

		scheduleSynchronizedJob('report-SCFDuplicates', '0 6 * * 1', first);
		scheduleSynchronizedJob('report-SCFDuplicates', '0 6 * * 1', second);

		for (const callback of callbacks) callback(fireDate);
		await flush();

		expect(first.mock.calls.length + second.mock.calls.length).toBe(1);
		expect(redis.strings.has(`schedule:report-SCFDuplicates:${fireDate.getTime()}`)).toBe(true);
	});

	test('Runs every new firing', async () => {
		const job = vi.fn(() => Promise.resolve());

		scheduleSynchronizedJob('process-queues', '* * * * *', job);

		callbacks[0]?.(new Date('2025-07-01T06:00:00Z'));
		callbacks[0]?.(new Date('2025-07-01T06:01:00Z'));
		await flush();

		expect(job).toHaveBeenCalledTimes(2);
	});

	test('Rejects a rule node-schedule cannot parse', () => {
		vi.mocked(scheduleJob).mockReturnValueOnce(null as unknown as Job);

		expect(() => scheduleSynchronizedJob('report-Broken', 'not a cron', () => Promise.resolve())).toThrow(
			'Invalid schedule "not a cron" for job "report-Broken"',
		);
	});

	test('Cancels the job on stop', () => {
		const job = scheduleSynchronizedJob('process-queues', '* * * * *', () => Promise.resolve());

		job.stop();

		expect(cancel).toHaveBeenCalledTimes(1);
	});
});

describe('scheduleLocalJob', () => {
	test('Runs each firing on every instance', async () => {
		const first = vi.fn(() => Promise.resolve());
		const second = vi.fn(() => Promise.resolve());
		const fireDate = new Date('2025-07-01T06:05:00Z');

		scheduleLocalJob('refresh-report-schedules', '*/5 * * * *', first);
		scheduleLocalJob('refresh-report-schedules', '*/5 * * * *', second);

		for (const callback of callbacks) callback(fireDate);
		await flush();

		expect(first).toHaveBeenCalledTimes(1);
		expect(second).toHaveBeenCalledTimes(1);
		expect(redis.strings.size).toBe(0);
	});
});
