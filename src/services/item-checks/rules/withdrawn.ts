import type { AlmaItem } from '../../../types/index.js';
import type { ItemRule, ItemTable, RuleOutcome } from '../types.js';

export class WithdrawnRule implements ItemRule {
	readonly name = 'SCFWithdrawn';

	evaluate(item: AlmaItem): RuleOutcome {
		if (item.item_data.alternative_call_number === 'WD') {
			return { passed: false, reason: 'Item call number marks the item as withdrawn' };
		}

		return { passed: true };
	}

	describe(item: AlmaItem): ItemTable {
		return {
			headers: ['Title', 'Author', 'Barcode', 'Item Call Number', 'Internal Note 1'],
			row: [
				item.bib_data.title ?? '',
				item.bib_data.author ?? '',
				item.item_data.barcode ?? '',
				item.item_data.alternative_call_number ?? '',
				item.item_data.internal_note_1 ?? '',
			],
		};
	}
}
