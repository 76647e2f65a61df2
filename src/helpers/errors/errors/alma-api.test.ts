import { expect, test } from 'vitest';
import { messageConstructor } from './alma-api.js';

test('Constructs message with status and Alma error code', () => {
	expect(messageConstructor({ status: 400, almaCode: '401689', reason: 'No items found for barcode 123.' })).toBe(
		'Alma API request failed (HTTP 400, Alma error 401689): No items found for barcode 123.',
	);
});

test('Constructs message without status', () => {
	expect(messageConstructor({ status: null, almaCode: null, reason: 'socket hang up' })).toBe(
		'Alma API request failed: socket hang up',
	);
});
