import { describe, expect, test } from 'vitest';
import { recordsToTable } from './html-table.js';

describe('recordsToTable', () => {
	test('Returns null without records', () => {
		expect(recordsToTable([])).toBeNull();
		expect(recordsToTable(['not a record', 4])).toBeNull();
	});

	test('Uses the union of keys in first-seen order', () => {
		expect(recordsToTable([{ Barcode: '1', Title: 'A' }, { Title: 'B', Count: 2 }])).toEqual({
			headers: ['Barcode', 'Title', 'Count'],
			rows: [
				['1', 'A', ''],
				['', 'B', '2'],
			],
		});
	});

	test('Drops column "0" when it only holds zeros', () => {
		expect(recordsToTable([{ '0': '0', Barcode: '1' }, { '0': '0', Barcode: '2' }])).toEqual({
			headers: ['Barcode'],
			rows: [['1'], ['2']],
		});
	});

	test('Keeps column "0" when any value differs', () => {
		expect(recordsToTable([{ '0': '0', Barcode: '1' }, { '0': '3', Barcode: '2' }])?.headers).toEqual(['0', 'Barcode']);
	});

	test('Renders null as empty and objects as JSON', () => {
		expect(recordsToTable([{ a: null, b: { c: 1 } }])?.rows).toEqual([['', '{"c":1}']]);
	});
});
