import type { Redis } from 'ioredis';
import { createRedis } from './lib/create-redis.js';

let redis: Redis | null = null;

/**
 * Shared Redis connection for queues, locks and schedules
 */
export const useRedis = (): Redis => {
	if (redis) return redis;

	redis = createRedis();

	return redis;
};

export const closeRedis = async (): Promise<void> => {
	if (!redis) return;

	await redis.quit();
	redis = null;
};
