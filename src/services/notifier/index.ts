import { randomUUID } from 'node:crypto';
import { useEnv } from '../../helpers/env/index.js';
import { ItemNotFoundError } from '../../helpers/errors/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import { generateJobId } from '../../helpers/utils/generate-job-id.js';
import { getStorage } from '../../storage/index.js';
import { ACS_SENDER_LOCATION, NOTIFIER_LOCATION } from '../../storage/register-locations.js';
import type { StorageManager } from '../../storage/storage-manager/index.js';
import type {
	AlmaItem,
	AlmaReportRow,
	Check,
	EmailMessage,
	Notification,
	NotificationOutcome,
	User,
} from '../../types/index.js';
import { ChecksService } from '../checks.js';
import type { ItemTable } from '../item-checks/types.js';
import { MailService } from '../mail/index.js';
import { NotificationsService } from '../notifications.js';
import type { NotifierMessage } from '../queues/types/queue.js';
import { UsersService } from '../users.js';
import { NO_DISPLAYABLE_DATA, recordsToTable } from './html-table.js';

export type NotifierQueueLike = {
	addToQueue(message: NotifierMessage): Promise<boolean>;
};

export type NotifierServiceOptions = {
	queue: NotifierQueueLike;
	checks?: Pick<ChecksService, 'readOne'>;
	users?: Pick<UsersService, 'getSubscribersForCheck'>;
	notifications?: Pick<NotificationsService, 'createOne' | 'markStatus' | 'readByJobId'>;
	mail?: Pick<MailService, 'renderTemplate' | 'send'>;
	storage?: StorageManager;
};

export type ItemNotificationInput = {
	check: Check;
	item: AlmaItem;
	outcome: Exclude<NotificationOutcome, 'report'>;
	table: ItemTable;
};

export type DeliveryResult = {
	status: 'sent' | 'skipped';
	reason?: string;
	blobName?: string;
};

const truthy = ['true', '1', 'yes', 'on'];

export function isEmailDisabled(value: unknown): boolean {
	return value === true || truthy.includes(String(value ?? '').trim().toLowerCase());
}

/**
 * Prepares notifications and hands rendered emails to the configured sender
 */
export class NotifierService {
	private logger = useLogger();
	private env = useEnv();

	private queue: NotifierQueueLike;
	private checks: NonNullable<NotifierServiceOptions['checks']>;
	private users: NonNullable<NotifierServiceOptions['users']>;
	private notifications: NonNullable<NotifierServiceOptions['notifications']>;
	private mail: NonNullable<NotifierServiceOptions['mail']>;
	private storageManager: StorageManager | null;

	constructor(options: NotifierServiceOptions) {
		this.queue = options.queue;
		this.checks = options.checks ?? new ChecksService();
		this.users = options.users ?? new UsersService();
		this.notifications = options.notifications ?? new NotificationsService();
		this.mail = options.mail ?? new MailService();
		this.storageManager = options.storage ?? null;
	}

	private async storage(): Promise<StorageManager> {
		if (!this.storageManager) {
			this.storageManager = await getStorage();
		}

		return this.storageManager;
	}

	/**
	 * Render the item table for a failed or fixed item, store it, record the notification and
	 * queue it for delivery
	 */
	async queueNotification({ check, item, outcome, table }: ItemNotificationInput): Promise<Notification> {
		const jobId = generateJobId(check.name);
		const container = String(this.env['NOTIFIER_CONTAINER_NAME']);
		const blobName = `${jobId}-addendum.html`;

		const addendum = await this.mail.renderTemplate('table', {
			caption: check.email_subject,
			headers: table.headers,
			rows: [table.row],
		});

		const storage = await this.storage();
		await storage.location(NOTIFIER_LOCATION).write(blobName, addendum, 'text/html');

		const notification = await this.notifications.createOne({
			check_id: check.id,
			job_id: jobId,
			item: item.item_data.barcode ?? '',
			outcome,
			status: 'queued',
			container,
			blob_name: blobName,
		});

		await this.queue.addToQueue({
			job_id: jobId,
			check_id: check.id,
			notification_id: notification.id,
			email_body_addendum_container_name: container,
			email_body_addendum_blob_name: blobName,
		});

		this.logger.info(`Job ${jobId}: queued ${outcome} notification for ${check.name}`);

		return notification;
	}

	/**
	 * Store report rows and queue them for delivery. Nothing is queued for an empty report.
	 */
	async queueReport(check: Check, rows: AlmaReportRow[]): Promise<Notification | null> {
		const jobId = generateJobId(check.name);

		if (rows.length === 0) {
			this.logger.info(`Job ${jobId}: No results found.`);
			return null;
		}

		const container = String(this.env['NOTIFIER_CONTAINER_NAME']);
		const blobName = `${jobId}.json`;

		const storage = await this.storage();
		await storage.location(NOTIFIER_LOCATION).write(blobName, JSON.stringify(rows), 'application/json');

		const notification = await this.notifications.createOne({
			check_id: check.id,
			job_id: jobId,
			item: check.report_path ?? check.name,
			outcome: 'report',
			status: 'queued',
			container,
			blob_name: blobName,
		});

		await this.queue.addToQueue({
			job_id: jobId,
			check_id: check.id,
			notification_id: notification.id,
			combined_data_container: container,
			combined_data_blob: blobName,
		});

		this.logger.info(`Job ${jobId}: queued report with ${rows.length} rows for ${check.name}`);

		return notification;
	}

	/**
	 * Render report records as an HTML table
	 */
	async createHtmlTable(records: unknown[]): Promise<string> {
		const table = recordsToTable(records);

		if (!table) return NO_DISPLAYABLE_DATA;

		return this.mail.renderTemplate('table', { caption: null, headers: table.headers, rows: table.rows });
	}

	async renderEmailBody(check: Check, jobId: string, bodyAddendum: string | null, htmlTable: string | null): Promise<string> {
		return this.mail.renderTemplate('email', {
			email_caption: check.email_subject,
			email_body: check.email_body,
			body_addendum: bodyAddendum,
			data_table_html: htmlTable,
			job_id: jobId,
		});
	}

	/**
	 * Turn a notifier message into an email and hand it to the sender. Errors thrown here are
	 * retried by the queue.
	 */
	async deliver(message: NotifierMessage): Promise<DeliveryResult> {
		const jobId = message.job_id;

		let check: Check;

		try {
			check = await this.checks.readOne(message.check_id);
		} catch (error) {
			if (error instanceof ItemNotFoundError) {
				return this.skip(message, `Check ${message.check_id} not found`);
			}

			throw error;
		}

		const users = await this.users.getSubscribersForCheck(check.id);

		if (users.length === 0) {
			return this.skip(message, 'No users are subscribed to notifications');
		}

		const htmlTable = await this.loadDataTable(message);
		const bodyAddendum = await this.loadAddendum(message);

		if (htmlTable === null && bodyAddendum === null) {
			return this.skip(message, 'No data table or addendum to send');
		}

		const html = await this.renderEmailBody(check, jobId, bodyAddendum, htmlTable);

		const email: EmailMessage = {
			to: users.map((user: User) => user.email),
			subject: check.email_subject ?? check.name,
			html,
		};

		if (isEmailDisabled(this.env['DISABLE_EMAIL'])) {
			return this.skip(message, 'Email is disabled', email.to.length);
		}

		const blobName = await this.send(email, jobId);

		const notificationId = await this.resolveNotificationId(message);

		if (notificationId !== null) {
			await this.notifications.markStatus(notificationId, 'sent', { recipients: email.to.length, error: null });
		}

		this.logger.info(`Job ${jobId}: email for ${check.name} handed to ${email.to.length} recipients`);

		return { status: 'sent', ...(blobName !== null && { blobName }) };
	}

	/**
	 * Mark the notification of a message that exhausted its retries
	 */
	async markFailed(message: NotifierMessage, error: Error): Promise<void> {
		const notificationId = await this.resolveNotificationId(message);

		if (notificationId !== null) {
			await this.notifications.markStatus(notificationId, 'failed', { error: error.message });
		}
	}

	/**
	 * @returns the blob name when delivered through the external sender's container
	 */
	private async send(email: EmailMessage, jobId: string): Promise<string | null> {
		if (this.env['EMAIL_DELIVERY'] === 'mailer') {
			await this.mail.send({
				to: email.to,
				...(email.cc && { cc: email.cc }),
				subject: email.subject,
				...(email.html !== undefined && { html: email.html }),
				...(email.plaintext !== undefined && { text: email.plaintext }),
			});

			return null;
		}

		const blobName = `${jobId}-${randomUUID()}.json`;

		const storage = await this.storage();

		this.logger.info(`Job ${jobId}: Uploading email content to blob "${blobName}"`);

		await storage.location(ACS_SENDER_LOCATION).write(
			blobName,
			JSON.stringify({
				to: email.to,
				cc: email.cc ?? null,
				subject: email.subject,
				html: email.html ?? null,
				plaintext: email.plaintext ?? null,
			}),
			'application/json',
		);

		return blobName;
	}

	private async loadDataTable(message: NotifierMessage): Promise<string | null> {
		if (!message.combined_data_blob) return null;

		const container = message.combined_data_container ?? String(this.env['NOTIFIER_CONTAINER_NAME']);

		let records: unknown;

		try {
			const storage = await this.storage();
			records = JSON.parse(await storage.readText(storage.container(container), message.combined_data_blob));
		} catch (error) {
			this.logger.error(error, `Job ${message.job_id}: Error downloading blob ${message.combined_data_blob}`);
			return null;
		}

		if (!Array.isArray(records)) {
			this.logger.error(`Job ${message.job_id}: Blob ${message.combined_data_blob} does not hold a list of records`);
			return null;
		}

		return this.createHtmlTable(records);
	}

	private async loadAddendum(message: NotifierMessage): Promise<string | null> {
		if (message.email_body_addendum) return message.email_body_addendum;

		if (!message.email_body_addendum_blob_name) return null;

		const container = message.email_body_addendum_container_name ?? String(this.env['NOTIFIER_CONTAINER_NAME']);
		const storage = await this.storage();

		return storage.readText(storage.container(container), message.email_body_addendum_blob_name);
	}

	private async resolveNotificationId(message: NotifierMessage): Promise<number | null> {
		if (message.notification_id !== undefined) return message.notification_id;

		const notification = await this.notifications.readByJobId(message.job_id);

		return notification?.id ?? null;
	}

	private async skip(message: NotifierMessage, reason: string, recipients = 0): Promise<DeliveryResult> {
		this.logger.warn(`Job ${message.job_id}: ${reason}. Skipping email.`);

		const notificationId = await this.resolveNotificationId(message);

		if (notificationId !== null) {
			await this.notifications.markStatus(notificationId, 'skipped', { recipients, error: reason });
		}

		return { status: 'skipped', reason };
	}
}
