import { closeDatabase } from '../../../database/index.js';
import { useEnv } from '../../../helpers/env/index.js';
import { useLogger } from '../../../helpers/logger/index.js';
import { closeRedis } from '../../../redis/index.js';
import { QueueManager } from '../../../services/queues/queue-manager.js';

/**
 * Drain every queue until empty, then exit
 */
export default async function worker({ deadLetter }: { deadLetter?: boolean }): Promise<void> {
	const env = useEnv();
	const logger = useLogger();

	try {
		const queueManager = new QueueManager();
		const batchSize = Number(env['QUEUE_BATCH_SIZE']);

		if (deadLetter) {
			await queueManager.processDeadLetterQueue();
		}

		let total = 0;

		for (;;) {
			const processed = await queueManager.processAllQueues(batchSize);
			const count = Object.values(processed).reduce((sum, n) => sum + n, 0);

			total += count;

			if (count === 0) break;
		}

		logger.info(`Worker processed ${total} queue items`);

		await closeDatabase();
		await closeRedis();
		process.exit(0);
	} catch (err: unknown) {
		logger.error(err);
		process.exit(1);
	}
}
