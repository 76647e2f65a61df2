import { useEnv } from '../../../helpers/env/index.js';
import { NotifierService } from '../../notifier/index.js';
import { BaseQueue } from '../base-queue.js';
import type { NotifierMessage } from '../types/queue.js';

const optionalStrings = [
	'combined_data_container',
	'combined_data_blob',
	'email_body_addendum',
	'email_body_addendum_container_name',
	'email_body_addendum_blob_name',
] as const;

export function isNotifierMessage(value: unknown): value is NotifierMessage {
	if (typeof value !== 'object' || value === null) return false;
	if (!('job_id' in value) || typeof value.job_id !== 'string' || value.job_id === '') return false;
	if (!('check_id' in value) || typeof value.check_id !== 'number') return false;
	if ('notification_id' in value && value.notification_id !== undefined && typeof value.notification_id !== 'number') {
		return false;
	}

	const record: Record<string, unknown> = { ...value };

	return optionalStrings.every((key) => record[key] === undefined || typeof record[key] === 'string');
}

/**
 * Messages describing an email still to be rendered and delivered
 */
export class NotifierQueue extends BaseQueue<NotifierMessage> {
	private notifier: Pick<NotifierService, 'deliver' | 'markFailed'> | null;

	constructor(notifier?: Pick<NotifierService, 'deliver' | 'markFailed'>) {
		super(String(useEnv()['NOTIFIER_QUEUE_NAME']));
		this.notifier = notifier ?? null;
	}

	private get service(): Pick<NotifierService, 'deliver' | 'markFailed'> {
		if (!this.notifier) {
			this.notifier = new NotifierService({ queue: this });
		}

		return this.notifier;
	}

	protected parse(raw: unknown): NotifierMessage | null {
		return isNotifierMessage(raw) ? raw : null;
	}

	protected getLockKey(message: NotifierMessage): string {
		return message.job_id;
	}

	public async process(message: NotifierMessage): Promise<void> {
		const result = await this.service.deliver(message);

		this.logger.debug({ jobId: message.job_id, ...result }, `Notifier message processed`);
	}

	protected override async onFailed(message: NotifierMessage, error: Error): Promise<void> {
		await this.service.markFailed(message, error);
	}
}
