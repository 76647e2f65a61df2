import { describe, expect, test, vi } from 'vitest';
import type { AlmaItem } from '../../../types/index.js';
import type { AlmaClient } from '../../alma/index.js';
import type { ItemRule } from '../types.js';
import { getDefaultRules, NoRowTrayRule, NoXRule, WithdrawnRule } from './index.js';

function makeItem(itemData: AlmaItem['item_data'] = {}): AlmaItem {
	return {
		bib_data: { mms_id: '991000000001', title: 'A test title', author: 'Author, Test' },
		holding_data: { holding_id: '221000000001' },
		item_data: { pid: '231000000001', barcode: '32882000000001X', ...itemData },
	};
}

describe('getDefaultRules', () => {
	test('Returns the rules in evaluation order', () => {
		expect(getDefaultRules().map((rule) => rule.name)).toEqual(['ScfNoX', 'SCFNoRowTray', 'SCFWithdrawn']);
	});
});

describe('NoXRule', () => {
	const rule = new NoXRule();

	test('Passes barcodes ending with X', () => {
		expect(rule.evaluate(makeItem())).toEqual({ passed: true });
	});

	test('Fails barcodes without the X suffix', () => {
		expect(rule.evaluate(makeItem({ barcode: '32882000000001' }))).toEqual({
			passed: false,
			reason: 'Barcode "32882000000001" does not end with X',
		});
	});

	test('Treats a lowercase x as missing', () => {
		expect(rule.evaluate(makeItem({ barcode: '32882000000001x' })).passed).toBe(false);
	});

	test('Fix appends X and writes the item back', async () => {
		const updateItem = vi.fn<AlmaClient['updateItem']>((item) => Promise.resolve(item));
		const client = { updateItem } as unknown as AlmaClient;

		const fixed = await rule.fix(makeItem({ barcode: '32882000000001' }), client);

		expect(fixed.item_data.barcode).toBe('32882000000001X');
		expect(updateItem).toHaveBeenCalledWith(fixed);
	});

	test('Fix leaves the original record untouched', async () => {
		const client = { updateItem: vi.fn().mockResolvedValue(null) } as unknown as AlmaClient;
		const original = makeItem({ barcode: '32882000000001' });

		await rule.fix(original, client);

		expect(original.item_data.barcode).toBe('32882000000001');
	});

	test('Describes title, author and barcode', () => {
		expect(rule.describe(makeItem())).toEqual({
			headers: ['Title', 'Author', 'Barcode'],
			row: ['A test title', 'Author, Test', '32882000000001X'],
		});
	});
});

describe('NoRowTrayRule', () => {
	const rule = new NoRowTrayRule();

	test('Passes a row/tray call number', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: 'R01M02S03' }))).toEqual({ passed: true });
	});

	test('Fails when the alternative call number is missing', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: null }))).toEqual({
			passed: false,
			reason: 'Alternative call number is not set',
		});
	});

	test('Fails when the call number is not in row/tray format', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: 'QA76.73' }))).toEqual({
			passed: false,
			reason: 'Alternative call number "QA76.73" is not in row/tray format',
		});
	});

	test('Fails when internal note 1 is set but not in row/tray format', () => {
		expect(
			rule.evaluate(makeItem({ alternative_call_number: 'R01M02S03', internal_note_1: 'Shelf 4' })),
		).toEqual({
			passed: false,
			reason: 'Internal note 1 "Shelf 4" is not in row/tray format',
		});
	});

	test('Accepts values in a skip location', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: 'WRLC Gemtrac Drawer 12' }))).toEqual({
			passed: true,
		});
	});

	test('Passes any item with an excluded internal note', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: null, internal_note_1: 'DO NOT DELETE' }))).toEqual({
			passed: true,
		});
	});

	test('Renders missing values as None', () => {
		const item = makeItem({ alternative_call_number: null });
		item.bib_data.author = null;

		expect(rule.describe(item)).toEqual({
			headers: ['Title', 'Author', 'Barcode', 'Item Call Number', 'Internal Note 1'],
			row: ['A test title', 'None', '32882000000001X', 'None', 'None'],
		});
	});
});

describe('WithdrawnRule', () => {
	const rule = new WithdrawnRule();

	test('Fails items with call number WD', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: 'WD' }))).toEqual({
			passed: false,
			reason: 'Item call number marks the item as withdrawn',
		});
	});

	test('Passes everything else', () => {
		expect(rule.evaluate(makeItem({ alternative_call_number: 'WD1' }))).toEqual({ passed: true });
		expect(rule.evaluate(makeItem({ alternative_call_number: null }))).toEqual({ passed: true });
	});

	test('Has no fix', () => {
		const asRule: ItemRule = rule;

		expect(asRule.fix).toBeUndefined();
	});

	test('Renders missing values as empty strings', () => {
		expect(rule.describe(makeItem({ alternative_call_number: 'WD' })).row).toEqual([
			'A test title',
			'Author, Test',
			'32882000000001X',
			'WD',
			'',
		]);
	});
});
