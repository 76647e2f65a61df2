import { createHash } from 'node:crypto';
import { useEnv } from '../../helpers/env/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import { useRedis } from '../../redis/index.js';
import { withLock } from '../../redis/utils/distributed-lock.js';
import { DEAD_LETTER_QUEUE, MAX_DEAD_LETTER_AGE_MS, type DeadLetterQueueItem } from './types/queue.js';

const MAX_DEAD_LETTER_ITEMS = 1000;
const FAILED_SINCE_TTL_SECONDS = (2 * MAX_DEAD_LETTER_AGE_MS) / 1000;

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * BaseQueue provides common functionality for all queue implementations.
 * Each specific queue extends this class and implements its own processing logic.
 */
export abstract class BaseQueue<T> {
	protected redis = useRedis();
	protected logger = useLogger();
	protected env = useEnv();
	protected maxRetries = 2;
	protected lockTimeout = 30000;

	/**
	 * @param queueName The name of the Redis list backing the queue
	 */
	constructor(public readonly queueName: string) {}

	/**
	 * Add an item to the queue unless an identical item was added within the deduplication window
	 *
	 * @returns false when the item was a duplicate
	 */
	public async addToQueue(item: T, deduplicationWindow = Number(this.env['QUEUE_DEDUPLICATION_WINDOW'])): Promise<boolean> {
		const itemString = JSON.stringify(item);
		const hash = createHash('md5').update(this.getDeduplicationKey(item)).digest('hex');
		const uniqueKey = `uniq:${this.queueName}:${hash}`;

		const wasSet = await this.redis.set(uniqueKey, '1', 'EX', deduplicationWindow, 'NX');

		if (!wasSet) {
			this.logger.debug(`Skipping duplicate item for queue ${this.queueName}`);
			return false;
		}

		await this.redis.rpush(this.queueName, itemString);

		return true;
	}

	/**
	 * Put an item back on the queue, bypassing deduplication
	 */
	public async requeue(item: unknown): Promise<void> {
		await this.redis.rpush(this.queueName, JSON.stringify(item));
	}

	/**
	 * Get and remove an item from the front of the queue
	 *
	 * @returns The parsed item, undefined when the entry was not JSON, or null if the queue is empty
	 */
	protected async getFromQueue(): Promise<unknown> {
		const item = await this.redis.lpop(this.queueName);
		if (item === null) return null;

		try {
			const parsed: unknown = JSON.parse(item);
			return parsed;
		} catch (error) {
			this.logger.error(error, `Failed to parse queue item from ${this.queueName}`);
			return undefined;
		}
	}

	public async getQueueSize(): Promise<number> {
		return this.redis.llen(this.queueName);
	}

	/**
	 * Handle retry logic for failed operations
	 *
	 * @param key Unique key for tracking retry attempts
	 * @param currentRetryCount Current retry count
	 * @param retryOperation Operation to retry
	 * @param error Error that caused the failure
	 */
	protected async handleRetry(
		key: string,
		currentRetryCount: number,
		retryOperation: () => Promise<void>,
		error: unknown,
	): Promise<void> {
		await this.redis.incr(key);
		await this.redis.expire(key, 3600);

		this.logger.warn({ err: error }, `Operation failed, retrying (${currentRetryCount + 1}/${this.maxRetries}): ${key}`);

		if (currentRetryCount < this.maxRetries) {
			await retryOperation();
		}
	}

	protected async getRetryCount(key: string): Promise<number> {
		return parseInt((await this.redis.get(key)) ?? '0', 10);
	}

	protected async clearRetryCount(key: string): Promise<void> {
		await this.redis.del(key);
	}

	/**
	 * Move a failed item to the dead letter queue. The first failure time stays with the item under
	 * `failureKey` until it succeeds or is dropped.
	 */
	protected async handleFailedItem(item: unknown, error: Error, failureKey?: string): Promise<void> {
		const timestamp = new Date().toISOString();
		let firstFailedAt = timestamp;

		if (failureKey) {
			await this.redis.set(failureKey, timestamp, 'EX', FAILED_SINCE_TTL_SECONDS, 'NX');
			firstFailedAt = (await this.redis.get(failureKey)) ?? timestamp;
		}

		const deadLetterItem: DeadLetterQueueItem = {
			queueName: this.queueName,
			item,
			errorMessage: error.message,
			errorStack: error.stack ?? null,
			timestamp,
			firstFailedAt,
			...(failureKey !== undefined && { failureKey }),
		};

		const queueLength = await this.redis.llen(DEAD_LETTER_QUEUE);

		if (queueLength >= MAX_DEAD_LETTER_ITEMS) {
			await this.redis.ltrim(DEAD_LETTER_QUEUE, -MAX_DEAD_LETTER_ITEMS + 1, -1);
		}

		await this.redis.rpush(DEAD_LETTER_QUEUE, JSON.stringify(deadLetterItem));

		this.logger.error(error, `Item moved to dead letter queue: ${this.queueName}`);
	}

	/**
	 * Execute an operation with locking to prevent concurrent processing
	 */
	protected async withQueueItemLock<R>(lockKey: string, operation: () => Promise<R>, timeout = 10000): Promise<R | null> {
		return withLock(lockKey, operation, timeout);
	}

	/**
	 * Process up to `maxBatchSize` items, stopping early when the queue runs dry
	 *
	 * @returns Number of items taken off the queue
	 */
	public async processQueue(maxBatchSize = 10): Promise<number> {
		let processedCount = 0;

		while (processedCount < maxBatchSize) {
			const raw = await this.getFromQueue();
			if (raw === null) break;

			processedCount++;

			if (raw === undefined) continue;

			await this.processItem(raw);
		}

		if (processedCount >= maxBatchSize) {
			this.logger.info(`Processed ${processedCount} items from ${this.queueName}, continuing on the next run`);
		}

		return processedCount;
	}

	private async processItem(raw: unknown): Promise<void> {
		const item = this.parse(raw);

		if (item === null) {
			this.logger.error({ item: raw }, `Dropping malformed item from ${this.queueName}`);
			return;
		}

		const lockKey = `${this.queueName}:${this.getLockKey(item)}`;
		const retryKey = `retry:${lockKey}`;
		const failureKey = `failed-since:${lockKey}`;

		try {
			const outcome = await this.withQueueItemLock(
				lockKey,
				async () => {
					const retryCount = await this.getRetryCount(retryKey);

					try {
						await this.process(item);
						await this.redis.del(retryKey, failureKey);
					} catch (error) {
						if (retryCount < this.maxRetries) {
							await this.handleRetry(retryKey, retryCount, () => this.requeue(item), error);
							return 'retried';
						}

						await this.clearRetryCount(retryKey);
						await this.handleFailedItem(item, toError(error), failureKey);
						await this.onFailed(item, toError(error));
						return 'failed';
					}

					return 'done';
				},
				this.lockTimeout,
			);

			if (outcome === null) {
				this.logger.debug(`Item ${lockKey} is already being processed, skipping`);
			}
		} catch (error) {
			this.logger.error(error, `Failed to process item from ${this.queueName}`);
			await this.handleFailedItem(item, toError(error), failureKey);
		}
	}

	/**
	 * Validate a raw queue entry. Return null to drop it.
	 */
	protected abstract parse(raw: unknown): T | null;

	/**
	 * Key identifying the item for locking and retry tracking
	 */
	protected abstract getLockKey(item: T): string;

	/**
	 * What makes two items identical for deduplication
	 */
	protected getDeduplicationKey(item: T): string {
		return JSON.stringify(item);
	}

	/**
	 * Process a single item. Throwing schedules a retry.
	 */
	public abstract process(item: T): Promise<void>;

	/**
	 * Called once an item has exhausted its retries
	 */
	protected async onFailed(_item: T, _error: Error): Promise<void> {}
}
