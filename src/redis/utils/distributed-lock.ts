import { useLogger } from '../../helpers/logger/index.js';
import { useRedis } from '../index.js';

const RELEASE_SCRIPT = `
	if redis.call("get", KEYS[1]) == ARGV[1] then
		return redis.call("del", KEYS[1])
	else
		return 0
	end
`;

const EXTEND_SCRIPT = `
	if redis.call("get", KEYS[1]) == ARGV[1] then
		return redis.call("pexpire", KEYS[1], ARGV[2])
	else
		return 0
	end
`;

/**
 * Run an operation while holding a Redis lock. Returns null without running the operation
 * when somebody else holds the lock.
 *
 * The lock is held until the operation settles. A caller that times out gets a rejection, but the
 * lock stays (and keeps being extended) while the abandoned operation is still running.
 */
export async function withLock<T>(lockKey: string, operation: () => Promise<T>, timeoutMs = 30000): Promise<T | null> {
	const redis = useRedis();
	const logger = useLogger();

	const lockValue = `${process.pid}:${Date.now()}`;
	const fullLockKey = `lock:${lockKey}`;

	const startTime = Date.now();

	// Lock outlives the operation timeout so it can't expire mid-run
	const lockTtlMs = Math.max(timeoutMs * 2, 60000);
	const acquired = await redis.set(fullLockKey, lockValue, 'PX', lockTtlMs, 'NX');

	if (!acquired) {
		logger.debug(`Lock already held for ${lockKey}`);
		return null;
	}

	let timer: NodeJS.Timeout | undefined;
	let timedOut = false;

	const renewal = setInterval(() => {
		redis.eval(EXTEND_SCRIPT, 1, fullLockKey, lockValue, lockTtlMs).catch((error: unknown) => {
			logger.error(error, `Error extending lock ${lockKey}`);
		});
	}, lockTtlMs / 2);

	renewal.unref();

	const release = async (): Promise<void> => {
		clearInterval(renewal);

		try {
			await redis.eval(RELEASE_SCRIPT, 1, fullLockKey, lockValue);
		} catch (error) {
			logger.error(error, `Error releasing lock ${lockKey}`);
		}
	};

	const running = new Promise<T>((resolve) => resolve(operation()));
	const released = running.then(release, release);

	try {
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				timedOut = true;
				reject(new Error(`Operation timed out after ${timeoutMs}ms`));
			}, timeoutMs);
		});

		const result = await Promise.race([running, timeout]);

		const duration = Date.now() - startTime;
		if (duration > timeoutMs * 0.8) {
			logger.warn(`Operation took ${duration}ms (>80% of timeout) for ${lockKey}`);
		}

		return result;
	} catch (error) {
		const duration = Date.now() - startTime;

		if (timedOut) {
			logger.warn(`Operation timed out after ${duration}ms for ${lockKey}, keeping the lock until it settles`);
		} else {
			logger.error(error, `Error in locked operation for ${lockKey}`);
		}

		throw error;
	} finally {
		clearTimeout(timer);

		if (!timedOut) {
			await released;
		}
	}
}
