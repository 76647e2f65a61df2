import type { AlmaClient } from '../alma/index.js';
import type { AlmaItem } from '../../types/index.js';

export type RuleOutcome = { passed: true } | { passed: false; reason: string };

/**
 * Header and the single row describing an item in a notification
 */
export type ItemTable = {
	headers: string[];
	row: string[];
};

export interface ItemRule {
	/** Name of the Check record that configures the rule */
	readonly name: string;

	evaluate(item: AlmaItem): RuleOutcome;

	/**
	 * Correct the item in Alma and return the updated record
	 */
	fix?(item: AlmaItem, client: AlmaClient): Promise<AlmaItem>;

	describe(item: AlmaItem): ItemTable;
}
