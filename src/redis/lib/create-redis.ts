import { Redis } from 'ioredis';
import { useEnv } from '../../helpers/env/index.js';

/**
 * Create a new Redis instance based on the global env configuration
 *
 * @returns New Redis instance based on global configuration
 */
export const createRedis = (): Redis => {
	const env = useEnv();
	const connectionString = env['REDIS'];

	if (typeof connectionString === 'string') {
		return new Redis(connectionString);
	}

	return new Redis({
		host: String(env['REDIS_HOST'] ?? 'localhost'),
		port: Number(env['REDIS_PORT'] ?? 6379),
		db: Number(env['REDIS_DB'] ?? 0),
		...(env['REDIS_USERNAME'] ? { username: String(env['REDIS_USERNAME']) } : {}),
		...(env['REDIS_PASSWORD'] ? { password: String(env['REDIS_PASSWORD']) } : {}),
	});
};
