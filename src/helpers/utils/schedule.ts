import { scheduleJob, type Job } from 'node-schedule';
import { useLogger } from '../logger/index.js';
import { useRedis } from '../../redis/index.js';

export interface ScheduledJob {
	id: string;
	stop(): void;
}

/**
 * Claim one firing of a job for this instance. The claim expires on its own, so there is nothing to release.
 */
async function claimRun(id: string, fireDate: Date, ttlMs: number): Promise<boolean> {
	const redis = useRedis();
	const claimed = await redis.set(`schedule:${id}:${fireDate.getTime()}`, String(process.pid), 'PX', ttlMs, 'NX');
	return claimed === 'OK';
}

/**
 * Run a job on a cron schedule on this instance
 */
export function scheduleLocalJob(id: string, rule: string, callback: (fireDate: Date) => Promise<void>): ScheduledJob {
	const logger = useLogger();

	const job: Job | null = scheduleJob(id, rule, (fireDate) => {
		callback(fireDate).catch((error: unknown) => {
			logger.error(error, `Scheduled job "${id}" failed`);
		});
	});

	if (job === null) {
		throw new Error(`Invalid schedule "${rule}" for job "${id}"`);
	}

	return {
		id,
		stop() {
			job.cancel();
		},
	};
}

/**
 * Run a job on a cron schedule, at most once per firing across all running instances
 */
export function scheduleSynchronizedJob(
	id: string,
	rule: string,
	callback: (fireDate: Date) => Promise<void>,
	claimTtlMs = 60_000,
): ScheduledJob {
	const logger = useLogger();

	return scheduleLocalJob(id, rule, async (fireDate) => {
		if ((await claimRun(id, fireDate, claimTtlMs)) === false) {
			logger.debug(`Job "${id}" already claimed by another instance for ${fireDate.toISOString()}`);
			return;
		}

		await callback(fireDate);
	});
}
