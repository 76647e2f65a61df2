import { InvalidPayloadError } from '../../helpers/errors/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import { withLock } from '../../redis/utils/distributed-lock.js';
import type { AlmaItem, Check, CheckResult } from '../../types/index.js';
import { AlmaClient } from '../alma/index.js';
import { ChecksService } from '../checks.js';
import type { NotifierService } from '../notifier/index.js';
import { SHARED_CHECK_NAME } from './constants.js';
import { getDefaultRules } from './rules/index.js';
import { SharedGate } from './shared-gate.js';
import type { ItemRule } from './types.js';

const LOCK_TIMEOUT = 120000;

export type CheckEngineOptions = {
	notifier: Pick<NotifierService, 'queueNotification'>;
	checks?: Pick<ChecksService, 'readByName'>;
	createClient?: (apiKey: string) => AlmaClient;
	rules?: ItemRule[];
};

/**
 * Runs the registered rules against an item, fixing what can be fixed and forwarding every
 * failure or fix to the notifier
 */
export class CheckEngine {
	private logger = useLogger();
	private notifier: CheckEngineOptions['notifier'];
	private checks: NonNullable<CheckEngineOptions['checks']>;
	private createClient: NonNullable<CheckEngineOptions['createClient']>;
	private rules: ItemRule[];
	private gate: SharedGate;

	constructor(options: CheckEngineOptions) {
		this.notifier = options.notifier;
		this.checks = options.checks ?? new ChecksService();
		this.createClient = options.createClient ?? ((apiKey) => new AlmaClient(apiKey));
		this.rules = options.rules ?? getDefaultRules();
		this.gate = new SharedGate({ checks: this.checks, createClient: this.createClient });
	}

	/**
	 * Check an item while holding the lock on its barcode
	 *
	 * @returns null when another run holds the barcode
	 */
	async run(item: AlmaItem): Promise<CheckResult[] | null> {
		const barcode = item.item_data.barcode;

		if (!barcode) {
			throw new InvalidPayloadError({ reason: 'Item has no barcode' });
		}

		const results = await withLock(`item-check:${barcode}`, () => this.evaluate(item), LOCK_TIMEOUT);

		if (results === null) {
			this.logger.debug(`Item ${barcode} is already being checked, dropping request`);
		}

		return results;
	}

	async evaluate(item: AlmaItem): Promise<CheckResult[]> {
		const gate = await this.gate.resolve(item);

		if (!gate.proceed) {
			return [{ check: SHARED_CHECK_NAME, status: 'skipped', reason: gate.reason }];
		}

		let current = gate.item;
		const results: CheckResult[] = [];

		for (const rule of this.rules) {
			const check = await this.checks.readByName(rule.name);

			if (!check) {
				this.logger.error(`Check "${rule.name}" does not exist`);
				results.push({ check: rule.name, status: 'skipped', reason: 'Check not found' });
				continue;
			}

			if (!check.enabled) {
				results.push({ check: rule.name, status: 'skipped', reason: 'Check is disabled' });
				continue;
			}

			const outcome = rule.evaluate(current);

			if (outcome.passed) {
				results.push({ check: rule.name, status: 'passed' });
				continue;
			}

			this.logger.info(`${rule.name}: ${outcome.reason}`);

			const result = await this.remediate(rule, check, current, outcome.reason);

			current = result.item;

			const notification = await this.notifier.queueNotification({
				check,
				item: current,
				outcome: result.status,
				table: rule.describe(current),
			});

			results.push({
				check: rule.name,
				status: result.status,
				reason: result.reason,
				notification_id: notification.id,
			});
		}

		return results;
	}

	/**
	 * Apply the rule's fix, if it has one. A failed fix leaves the item untouched.
	 */
	private async remediate(
		rule: ItemRule,
		check: Check,
		item: AlmaItem,
		reason: string,
	): Promise<{ status: 'failed' | 'fixed'; item: AlmaItem; reason: string }> {
		if (!rule.fix) {
			return { status: 'failed', item, reason };
		}

		try {
			if (!check.api_key) {
				throw new Error(`Check "${check.name}" has no API key`);
			}

			const fixed = await rule.fix(item, this.createClient(check.api_key));

			this.logger.info(`${rule.name}: fixed item ${item.item_data.barcode ?? ''}`);

			return { status: 'fixed', item: fixed, reason };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);

			this.logger.error(error, `${rule.name}: fix failed`);

			return { status: 'failed', item, reason: `${reason}. Fix failed: ${message}` };
		}
	}
}
