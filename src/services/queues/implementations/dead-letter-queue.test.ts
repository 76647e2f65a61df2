import type { Redis } from 'ioredis';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { useRedis } from '../../../redis/index.js';
import { MemoryRedis } from '../../../redis/testing/memory-redis.js';
import type { QueueManager } from '../queue-manager.js';
import { DEAD_LETTER_QUEUE, type DeadLetterQueueItem } from '../types/queue.js';
import { DeadLetterQueue } from './dead-letter-queue.js';

vi.mock('../../../redis/index.js');

const now = new Date('2025-07-01T12:00:00Z');

function deadLetter(queueName: string, item: unknown, timestamp: string): string {
	const entry: DeadLetterQueueItem = { queueName, item, errorMessage: 'boom', errorStack: null, timestamp };
	return JSON.stringify(entry);
}

let redis: MemoryRedis;
const requeue = vi.fn((_item: unknown) => Promise.resolve());

function makeManager() {
	const getQueue = vi.fn((name: string) => (name === 'notifier-queue' ? { requeue } : undefined));
	return { getQueue } as unknown as QueueManager;
}

beforeEach(() => {
	vi.clearAllMocks();
	redis = new MemoryRedis();
	vi.mocked(useRedis).mockReturnValue(redis as unknown as Redis);
});

describe('DeadLetterQueue', () => {
	test('Requeues recent items to their original queue', async () => {
		await redis.rpush(DEAD_LETTER_QUEUE, deadLetter('notifier-queue', { job_id: 'job_a' }, '2025-07-01T11:00:00Z'));

		const queue = new DeadLetterQueue(makeManager());

		await expect(queue.processDeadLetterQueue(now)).resolves.toEqual({ removed: 0, retried: 1 });

		expect(requeue).toHaveBeenCalledWith({ job_id: 'job_a' });
		expect(await queue.getQueueSize()).toBe(0);
	});

	test('Drops items older than four hours and malformed entries', async () => {
		await redis.rpush(
			DEAD_LETTER_QUEUE,
			deadLetter('notifier-queue', { job_id: 'job_old' }, '2025-07-01T07:59:59Z'),
			'{"unexpected":true}',
			'not json',
		);

		const queue = new DeadLetterQueue(makeManager());

		const result = await queue.processDeadLetterQueue(now);

		expect(result).toEqual({ removed: 3, retried: 0 });
		expect(requeue).not.toHaveBeenCalled();
		expect(await queue.getQueueSize()).toBe(0);
	});

	test('Keeps items whose queue is unknown', async () => {
		const entry = deadLetter('gone-queue', { id: 1 }, '2025-07-01T11:30:00Z');
		await redis.rpush(DEAD_LETTER_QUEUE, entry);

		const queue = new DeadLetterQueue(makeManager());

		await expect(queue.processDeadLetterQueue(now)).resolves.toEqual({ removed: 0, retried: 0 });
		expect(await redis.lrange(DEAD_LETTER_QUEUE, 0, -1)).toEqual([entry]);
	});
});
