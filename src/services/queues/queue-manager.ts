import { useLogger } from '../../helpers/logger/index.js';
import type { BaseQueue } from './base-queue.js';
import { DeadLetterQueue } from './implementations/dead-letter-queue.js';
import { ItemCheckQueue } from './implementations/item-check-queue.js';
import { NotifierQueue } from './implementations/notifier-queue.js';
import { DEAD_LETTER_QUEUE } from './types/queue.js';

const logger = useLogger();

/**
 * QueueManager owns every queue instance and drives them from the schedulers and the CLI
 */
export class QueueManager {
	private deadLetterQueue: DeadLetterQueue;
	private notifierQueue: NotifierQueue;
	private itemCheckQueue: ItemCheckQueue;

	constructor(queues: { notifier?: NotifierQueue; itemCheck?: ItemCheckQueue } = {}) {
		this.deadLetterQueue = new DeadLetterQueue(this);
		this.notifierQueue = queues.notifier ?? new NotifierQueue();
		this.itemCheckQueue = queues.itemCheck ?? new ItemCheckQueue(this.notifierQueue);
	}

	/**
	 * Drain one batch of every queue. Item checks run first so the notifications they
	 * produce go out in the same pass.
	 *
	 * @returns Number of items taken off each queue
	 */
	public async processAllQueues(batchSize?: number): Promise<Record<string, number>> {
		const processed: Record<string, number> = {};

		for (const queue of [this.itemCheckQueue, this.notifierQueue]) {
			try {
				processed[queue.queueName] = await queue.processQueue(batchSize);
			} catch (error) {
				logger.error(error, `Error processing ${queue.queueName}`);
				processed[queue.queueName] = 0;
			}
		}

		return processed;
	}

	public async monitorQueueSizes(): Promise<Record<string, number>> {
		const queueSizes = {
			[DEAD_LETTER_QUEUE]: await this.deadLetterQueue.getQueueSize(),
			[this.itemCheckQueue.queueName]: await this.itemCheckQueue.getQueueSize(),
			[this.notifierQueue.queueName]: await this.notifierQueue.getQueueSize(),
		};

		logger.debug(queueSizes, 'Current queue sizes');

		return queueSizes;
	}

	public async processDeadLetterQueue(): Promise<{ removed: number; retried: number }> {
		return this.deadLetterQueue.processDeadLetterQueue();
	}

	/**
	 * Get a queue instance by the name of its Redis list
	 */
	public getQueue(name: string): BaseQueue<unknown> | undefined {
		switch (name) {
			case this.itemCheckQueue.queueName:
				return this.itemCheckQueue;
			case this.notifierQueue.queueName:
				return this.notifierQueue;
			default:
				logger.warn(`Attempted to get unknown queue instance: ${name}`);
				return undefined;
		}
	}

	public getItemCheckQueue(): ItemCheckQueue {
		return this.itemCheckQueue;
	}

	public getNotifierQueue(): NotifierQueue {
		return this.notifierQueue;
	}
}
