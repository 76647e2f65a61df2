import type { AlmaItem } from '../../../types/index.js';
import type { AlmaClient } from '../../alma/index.js';
import type { ItemRule, ItemTable, RuleOutcome } from '../types.js';

/**
 * SCF barcodes end with an "X". A missing suffix is appended and written back to Alma.
 */
export class NoXRule implements ItemRule {
	readonly name = 'ScfNoX';

	evaluate(item: AlmaItem): RuleOutcome {
		const barcode = item.item_data.barcode ?? '';

		if (barcode.endsWith('X')) {
			return { passed: true };
		}

		return { passed: false, reason: `Barcode "${barcode}" does not end with X` };
	}

	async fix(item: AlmaItem, client: AlmaClient): Promise<AlmaItem> {
		const fixed: AlmaItem = {
			...item,
			item_data: { ...item.item_data, barcode: `${item.item_data.barcode ?? ''}X` },
		};

		await client.updateItem(fixed);

		return fixed;
	}

	describe(item: AlmaItem): ItemTable {
		return {
			headers: ['Title', 'Author', 'Barcode'],
			row: [item.bib_data.title ?? '', item.bib_data.author ?? '', item.item_data.barcode ?? ''],
		};
	}
}
