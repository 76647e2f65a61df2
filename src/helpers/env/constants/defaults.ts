/**
 * Values used when neither the config file nor the process environment sets a key.
 *
 * | key | purpose |
 * |---|---|
 * | `DB_CLIENT` / `DB_CONNECTION_STRING` | knex client and connection (`SQLALCHEMY_CONNECTION_STRING` is read as an alias) |
 * | `REDIS` / `REDIS_*` | ioredis connection string or options |
 * | `STORAGE_DRIVER` | `azure` or `local` |
 * | `STORAGE_CONNECTION_STRING` | Azure storage account for the notifier container (`AzureWebJobsStorage` alias) |
 * | `NOTIFIER_QUEUE_NAME` / `NOTIFIER_CONTAINER_NAME` | notifier queue and payload container |
 * | `ACS_SENDER_CONTAINER_NAME` / `ACS_SENDER_CONNECTION_STRING` | drop-off container of the external email sender |
 * | `SCF_DUPLICATES_SCHEDULE` / `SCF_DUPLICATES_CHECK_NAME` | duplicate barcode report job |
 * | `SCF_WEBHOOK_SECRET` | shared secret for `X-Exl-Signature` |
 * | `EMAIL_DELIVERY` | `acs` (blob drop-off) or `mailer` (nodemailer) |
 * | `QUEUE_PROCESS_SCHEDULE` / `DEAD_LETTER_PROCESS_SCHEDULE` | cron rules of the queue workers |
 * | `REPORT_SCHEDULE_REFRESH` | how often each instance re-reads the schedules of report checks |
 * | `API_TOKEN` | bearer token required by `/api` (unset leaves the API open) |
 * | `DISABLE_EMAIL` | render notifications but never deliver them |
 */
export const DEFAULTS = {
	CONFIG_PATH: '.env',

	HOST: '0.0.0.0',
	PORT: 8080,
	PUBLIC_URL: '/',
	MAX_PAYLOAD_SIZE: '1mb',
	LOG_LEVEL: 'info',
	LOG_HTTP_IGNORE_PATHS: '/server/health',

	DB_CLIENT: 'pg',

	STORAGE_DRIVER: 'azure',
	STORAGE_LOCAL_ROOT: './uploads',

	NOTIFIER_QUEUE_NAME: 'notifier-queue',
	ITEM_CHECK_QUEUE_NAME: 'item-check-queue',
	QUEUE_PROCESS_SCHEDULE: '* * * * *',
	QUEUE_DEDUPLICATION_WINDOW: 60,
	QUEUE_BATCH_SIZE: 10,
	DEAD_LETTER_PROCESS_SCHEDULE: '0 * * * *',
	REPORT_SCHEDULE_REFRESH: '*/5 * * * *',

	SCF_DUPLICATES_CHECK_NAME: 'SCFDuplicates',

	ALMA_REGION: 'NA',
	ALMA_TIMEOUT: 30000,
	ALMA_REPORT_TIMEOUT: 250000,

	EMAIL_DELIVERY: 'acs',
	EMAIL_TRANSPORT: 'development',
	EMAIL_FROM: 'no-reply@example.com',
	EMAIL_TEMPLATES_PATH: './templates',
	DISABLE_EMAIL: false,
} as const satisfies Record<string, string | number | boolean>;

/**
 * Taken as written: a secret made of digits, or one spelled `true`, stays the string that was configured.
 * An explicit cast prefix still applies.
 */
export const STRING_KEYS: readonly string[] = [
	'SCF_WEBHOOK_SECRET',
	'API_TOKEN',
	'DB_PASSWORD',
	'DB_CONNECTION_STRING',
	'REDIS',
	'REDIS_PASSWORD',
	'EMAIL_SMTP_USER',
	'EMAIL_SMTP_PASSWORD',
	'STORAGE_CONNECTION_STRING',
	'ACS_SENDER_CONNECTION_STRING',
];

/**
 * Legacy names, read when the canonical key is absent
 */
export const ALIASES: Record<string, string> = {
	DB_CONNECTION_STRING: 'SQLALCHEMY_CONNECTION_STRING',
	STORAGE_CONNECTION_STRING: 'AzureWebJobsStorage',
	ACS_SENDER_CONNECTION_STRING: 'ACS_STORAGE_CONNECTION_STRING',
};
