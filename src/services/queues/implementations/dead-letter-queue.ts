import { useLogger } from '../../../helpers/logger/index.js';
import { useRedis } from '../../../redis/index.js';
import type { QueueManager } from '../queue-manager.js';
import { DEAD_LETTER_QUEUE, MAX_DEAD_LETTER_AGE_MS, type DeadLetterQueueItem } from '../types/queue.js';

function isDeadLetterQueueItem(value: unknown): value is DeadLetterQueueItem {
	return (
		typeof value === 'object' &&
		value !== null &&
		'queueName' in value &&
		typeof value.queueName === 'string' &&
		'timestamp' in value &&
		typeof value.timestamp === 'string' &&
		'item' in value &&
		(!('firstFailedAt' in value) || typeof value.firstFailedAt === 'string') &&
		(!('failureKey' in value) || typeof value.failureKey === 'string')
	);
}

/**
 * DeadLetterQueue holds items that exhausted their retries and hands recent ones back to
 * their original queue
 */
export class DeadLetterQueue {
	private redis = useRedis();
	private logger = useLogger();

	constructor(private queueManager: QueueManager) {}

	public async getQueueSize(): Promise<number> {
		return this.redis.llen(DEAD_LETTER_QUEUE);
	}

	/**
	 * Process and clean up the dead letter queue
	 * - Removes items that first failed more than 4 hours ago
	 * - Requeues newer items to their original queue
	 */
	public async processDeadLetterQueue(now = new Date()): Promise<{ removed: number; retried: number }> {
		const deadLetterItems = await this.redis.lrange(DEAD_LETTER_QUEUE, 0, -1);
		const cutoff = now.getTime() - MAX_DEAD_LETTER_AGE_MS;

		let removed = 0;
		let retried = 0;

		for (const entry of deadLetterItems) {
			const failedItem = this.parse(entry);

			if (failedItem === null || new Date(failedItem.firstFailedAt ?? failedItem.timestamp).getTime() < cutoff) {
				await this.redis.lrem(DEAD_LETTER_QUEUE, 1, entry);
				if (failedItem?.failureKey) await this.redis.del(failedItem.failureKey);
				removed++;
				continue;
			}

			try {
				await this.reprocessItem(failedItem);

				await this.redis.lrem(DEAD_LETTER_QUEUE, 1, entry);
				retried++;
			} catch (error) {
				this.logger.error({ err: error, item: entry }, 'Failed to process dead letter item');
			}
		}

		this.logger.info({ totalProcessed: deadLetterItems.length, removed, retried }, 'Dead letter queue cleanup completed');

		return { removed, retried };
	}

	private parse(entry: string): DeadLetterQueueItem | null {
		try {
			const parsed: unknown = JSON.parse(entry);
			return isDeadLetterQueueItem(parsed) ? parsed : null;
		} catch (error) {
			this.logger.warn({ err: error }, 'Dropping unparsable dead letter item');
			return null;
		}
	}

	/**
	 * Reprocess a failed item based on its original queue
	 */
	private async reprocessItem(failedItem: DeadLetterQueueItem): Promise<void> {
		const originalQueue = this.queueManager.getQueue(failedItem.queueName);

		if (!originalQueue) {
			throw new Error(`Queue instance for ${failedItem.queueName} not found during dead letter reprocessing.`);
		}

		await originalQueue.requeue(failedItem.item);

		this.logger.info(`Re-queued item to ${failedItem.queueName} from the dead letter queue`);
	}
}
