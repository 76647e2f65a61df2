import { useEnv } from '../../../helpers/env/index.js';
import { CheckEngine } from '../../item-checks/index.js';
import { NotifierService } from '../../notifier/index.js';
import { BaseQueue } from '../base-queue.js';
import type { ItemCheckRequest } from '../types/queue.js';
import type { NotifierQueue } from './notifier-queue.js';

function isItemCheckRequest(value: unknown): value is ItemCheckRequest {
	if (typeof value !== 'object' || value === null) return false;

	return (
		'event_id' in value &&
		typeof value.event_id === 'string' &&
		'barcode' in value &&
		typeof value.barcode === 'string' &&
		'item' in value &&
		typeof value.item === 'object' &&
		value.item !== null
	);
}

/**
 * Items received through the webhook, waiting for the check engine
 */
export class ItemCheckQueue extends BaseQueue<ItemCheckRequest> {
	private engine: Pick<CheckEngine, 'run'> | null;

	constructor(
		private notifierQueue: NotifierQueue,
		engine?: Pick<CheckEngine, 'run'>,
	) {
		super(String(useEnv()['ITEM_CHECK_QUEUE_NAME']));
		this.engine = engine ?? null;
		this.lockTimeout = 180000;
	}

	protected parse(raw: unknown): ItemCheckRequest | null {
		return isItemCheckRequest(raw) ? raw : null;
	}

	protected getLockKey(request: ItemCheckRequest): string {
		return request.event_id;
	}

	protected override getDeduplicationKey(request: ItemCheckRequest): string {
		return request.event_id;
	}

	public async process(request: ItemCheckRequest): Promise<void> {
		if (!this.engine) {
			this.engine = new CheckEngine({ notifier: new NotifierService({ queue: this.notifierQueue }) });
		}

		const results = await this.engine.run(request.item);

		if (results) {
			this.logger.info({ barcode: request.barcode, results }, `Checked item ${request.barcode}`);
		}
	}
}
