import { useEnv } from '../../helpers/env/index.js';
import { ItemNotFoundError } from '../../helpers/errors/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import type { Check, Notification } from '../../types/index.js';
import { AlmaClient } from '../alma/index.js';
import { ChecksService } from '../checks.js';
import type { NotifierService } from '../notifier/index.js';

export type ReportCheckOptions = {
	notifier: Pick<NotifierService, 'queueReport'>;
	checks?: Pick<ChecksService, 'readByName'>;
	createClient?: (apiKey: string) => Pick<AlmaClient, 'getReport'>;
};

/**
 * Pulls the analytics report a check points at and hands the rows to the notifier
 */
export class ReportCheckService {
	private logger = useLogger();
	private env = useEnv();
	private notifier: ReportCheckOptions['notifier'];
	private checks: NonNullable<ReportCheckOptions['checks']>;
	private createClient: NonNullable<ReportCheckOptions['createClient']>;

	constructor(options: ReportCheckOptions) {
		this.notifier = options.notifier;
		this.checks = options.checks ?? new ChecksService();
		this.createClient = options.createClient ?? ((apiKey) => new AlmaClient(apiKey));
	}

	/**
	 * @returns the queued notification, or null when the check is disabled or the report had no rows
	 */
	async run(name: string): Promise<Notification | null> {
		const check = await this.checks.readByName(name);

		if (!check) {
			throw new ItemNotFoundError({ collection: 'checks', id: name });
		}

		return this.runCheck(check);
	}

	async runCheck(check: Check): Promise<Notification | null> {
		if (!check.enabled) {
			this.logger.info(`Report check ${check.name} is disabled, skipping`);
			return null;
		}

		if (!check.api_key || !check.report_path) {
			throw new Error(`Check "${check.name}" needs both an API key and a report path`);
		}

		this.logger.info(`Running report check ${check.name}`);

		const rows = await this.createClient(check.api_key).getReport(
			check.report_path,
			Number(this.env['ALMA_REPORT_TIMEOUT']),
		);

		return this.notifier.queueReport(check, rows);
	}
}
