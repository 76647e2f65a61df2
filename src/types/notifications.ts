export type NotificationOutcome = 'failed' | 'fixed' | 'report';

export type NotificationStatus = 'queued' | 'sent' | 'skipped' | 'failed';

/**
 * History record of an issue found and/or fixed, or of a report run
 */
export type Notification = {
	id: number;
	check_id: number;
	job_id: string;
	/** Barcode of the originating item, or the analytics report path */
	item: string;
	outcome: NotificationOutcome;
	status: NotificationStatus;
	container: string | null;
	blob_name: string | null;
	recipients: number;
	error: string | null;
	created_at: Date;
	sent_at: Date | null;
};

/**
 * What the external email sender picks up from its container
 */
export type EmailMessage = {
	to: string[];
	cc?: string[];
	subject: string;
	html?: string;
	plaintext?: string;
};
