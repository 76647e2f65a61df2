export type Check = {
	id: number;
	name: string;
	api_key: string | null;
	report_path: string | null;
	email_subject: string | null;
	email_body: string | null;
	schedule: string | null;
	enabled: boolean;
	created_at: Date;
	updated_at: Date;
};

export type CheckStatus = 'passed' | 'failed' | 'fixed' | 'skipped';

export type CheckResult = {
	check: string;
	status: CheckStatus;
	reason?: string;
	notification_id?: number;
};
