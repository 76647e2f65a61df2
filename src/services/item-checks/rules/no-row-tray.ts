import type { AlmaItem } from '../../../types/index.js';
import { useLogger } from '../../../helpers/logger/index.js';
import { EXCLUDED_NOTES, ROW_TRAY_PATTERN, SKIP_LOCATIONS } from '../constants.js';
import type { ItemRule, ItemTable, RuleOutcome } from '../types.js';

export class NoRowTrayRule implements ItemRule {
	readonly name = 'SCFNoRowTray';

	private logger = useLogger();

	evaluate(item: AlmaItem): RuleOutcome {
		const reason = this.missingRowTray(item) ?? this.wrongRowTray(item);

		if (reason === null) {
			return { passed: true };
		}

		const note = item.item_data.internal_note_1;

		if (note !== null && note !== undefined && EXCLUDED_NOTES.includes(note)) {
			this.logger.debug(`${this.name}: internal note 1 "${note}" is excluded`);
			return { passed: true };
		}

		return { passed: false, reason };
	}

	private missingRowTray(item: AlmaItem): string | null {
		const altCallNumber = item.item_data.alternative_call_number;

		return altCallNumber === null || altCallNumber === undefined ? 'Alternative call number is not set' : null;
	}

	/**
	 * Any set field outside a skip location has to look like `R..M..S..`
	 */
	private wrongRowTray(item: AlmaItem): string | null {
		const fields: [label: string, value: string | null | undefined][] = [
			['Alternative call number', item.item_data.alternative_call_number],
			['Internal note 1', item.item_data.internal_note_1],
		];

		for (const [label, value] of fields) {
			if (value === null || value === undefined) continue;

			if (SKIP_LOCATIONS.some((location) => value.includes(location))) continue;

			if (!ROW_TRAY_PATTERN.test(value)) {
				return `${label} "${value}" is not in row/tray format`;
			}
		}

		return null;
	}

	describe(item: AlmaItem): ItemTable {
		return {
			headers: ['Title', 'Author', 'Barcode', 'Item Call Number', 'Internal Note 1'],
			row: [
				item.bib_data.title || 'None',
				item.bib_data.author || 'None',
				item.item_data.barcode || 'None',
				item.item_data.alternative_call_number || 'None',
				item.item_data.internal_note_1 || 'None',
			],
		};
	}
}
