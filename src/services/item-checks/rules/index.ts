import type { ItemRule } from '../types.js';
import { NoRowTrayRule } from './no-row-tray.js';
import { NoXRule } from './no-x.js';
import { WithdrawnRule } from './withdrawn.js';

export { NoRowTrayRule, NoXRule, WithdrawnRule };

/**
 * Rules in evaluation order
 */
export function getDefaultRules(): ItemRule[] {
	return [new NoXRule(), new NoRowTrayRule(), new WithdrawnRule()];
}
