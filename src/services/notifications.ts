import type { AbstractServiceOptions, Notification, NotificationStatus, PrimaryKey } from '../types/index.js';
import { ItemsService } from './items.js';

export class NotificationsService extends ItemsService<Notification> {
	constructor(options: AbstractServiceOptions = {}) {
		super('notifications', options);
	}

	async readByJobId(jobId: string): Promise<Notification | null> {
		const notification = await this.run<Notification | undefined>(() =>
			this.knex.select('*').from(this.collection).where({ job_id: jobId }).first(),
		);

		return notification ?? null;
	}

	async markStatus(
		key: PrimaryKey,
		status: NotificationStatus,
		details: { recipients?: number; error?: string | null } = {},
	): Promise<Notification> {
		return this.updateOne(
			key,
			{
				status,
				...details,
				...(status === 'sent' && { sent_at: new Date() }),
			},
			{ skipExistenceCheck: true },
		);
	}
}
