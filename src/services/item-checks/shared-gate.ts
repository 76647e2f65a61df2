import { useLogger } from '../../helpers/logger/index.js';
import type { AlmaItem } from '../../types/index.js';
import type { AlmaClient } from '../alma/index.js';
import type { ChecksService } from '../checks.js';
import { PROVENANCE, SHARED_CHECK_NAME } from './constants.js';

export type GateResult = { proceed: true; item: AlmaItem } | { proceed: false; reason: string };

export type SharedGateOptions = {
	checks: Pick<ChecksService, 'readByName'>;
	createClient: (apiKey: string) => AlmaClient;
};

function isDiscard(value: string | undefined): boolean {
	return value !== undefined && value.toLowerCase().includes('discard');
}

/**
 * Preconditions every SCF rule shares. Items passing the gate are re-read from Alma so rules
 * work on the current record rather than the webhook's copy.
 */
export class SharedGate {
	private logger = useLogger();
	private checks: SharedGateOptions['checks'];
	private createClient: SharedGateOptions['createClient'];

	constructor(options: SharedGateOptions) {
		this.checks = options.checks;
		this.createClient = options.createClient;
	}

	async resolve(item: AlmaItem): Promise<GateResult> {
		if (isDiscard(item.holding_data.temp_location?.value)) {
			return this.skip('Item is in a discard temporary location');
		}

		if (isDiscard(item.item_data.location?.value)) {
			return this.skip('Item is in a discard location');
		}

		const provenance = item.item_data.provenance?.desc;

		if (provenance === undefined || !PROVENANCE.includes(provenance)) {
			return this.skip('Item has no checked provenance');
		}

		const check = await this.checks.readByName(SHARED_CHECK_NAME);

		if (!check || !check.api_key) {
			this.logger.error(`Could not find check "${SHARED_CHECK_NAME}" or it has no API key`);
			return { proceed: false, reason: `Check "${SHARED_CHECK_NAME}" is missing or has no API key` };
		}

		const barcode = item.item_data.barcode ?? '';

		let current: AlmaItem | null;

		try {
			current = await this.createClient(check.api_key).getItemByBarcode(barcode);
		} catch (error) {
			this.logger.info({ err: error }, `Error retrieving item ${barcode} from Alma, skipping`);
			return { proceed: false, reason: 'Item lookup in Alma failed' };
		}

		if (!current) {
			return this.skip('Item is not active in Alma');
		}

		return { proceed: true, item: current };
	}

	private skip(reason: string): GateResult {
		this.logger.info(`${reason}, skipping processing`);
		return { proceed: false, reason };
	}
}
