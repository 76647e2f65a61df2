import type { AlmaItem } from '../../../types/index.js';

export const DEAD_LETTER_QUEUE = 'dead-letter-queue';

/** Items that first failed longer ago than this are dropped instead of retried */
export const MAX_DEAD_LETTER_AGE_MS = 4 * 60 * 60 * 1000;

/**
 * Type for failed items in the dead letter queue
 */
export interface DeadLetterQueueItem {
	queueName: string;
	item: unknown;
	errorMessage: string;
	errorStack: string | null;
	timestamp: string;
	/** When the item first failed, carried across every trip through the dead letter queue */
	firstFailedAt?: string;
	/** Redis key holding firstFailedAt for the item */
	failureKey?: string;
}

/**
 * An item that arrived through the webhook and still has to be checked
 */
export interface ItemCheckRequest {
	event_id: string;
	barcode: string;
	item: AlmaItem;
	received_at: string;
}

/**
 * Reference to the content of one email. Either or both of the report rows blob and the addendum
 * may be present.
 */
export interface NotifierMessage {
	job_id: string;
	check_id: number;
	notification_id?: number;
	combined_data_container?: string;
	combined_data_blob?: string;
	email_body_addendum?: string;
	email_body_addendum_container_name?: string;
	email_body_addendum_blob_name?: string;
}
