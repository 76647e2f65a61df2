import { beforeEach, describe, expect, test, vi } from 'vitest';
import { withLock } from '../../redis/utils/distributed-lock.js';
import type { AlmaItem, Check, Notification } from '../../types/index.js';
import type { AlmaClient } from '../alma/index.js';
import type { NotifierService } from '../notifier/index.js';
import { CheckEngine } from './index.js';
import type { ItemRule } from './types.js';

vi.mock('../../redis/utils/distributed-lock.js');

function makeCheck(name: string, overrides: Partial<Check> = {}): Check {
	return {
		id: name.length,
		name,
		api_key: 'test-api-key',
		report_path: null,
		email_subject: `${name} subject`,
		email_body: null,
		schedule: null,
		enabled: true,
		created_at: new Date('2025-01-01T00:00:00Z'),
		updated_at: new Date('2025-01-01T00:00:00Z'),
		...overrides,
	};
}

function makeItem(itemData: Partial<AlmaItem['item_data']> = {}): AlmaItem {
	return {
		bib_data: { mms_id: '991000000001', title: 'A test title', author: 'Author, Test' },
		holding_data: { holding_id: '221000000001' },
		item_data: {
			pid: '231000000001',
			barcode: '32882000000001',
			provenance: { desc: 'Property of American University' },
			alternative_call_number: 'R01M02S03',
			...itemData,
		},
	};
}

function setup(options: { checks?: Record<string, Check>; item?: AlmaItem; updateItem?: AlmaClient['updateItem']; rules?: ItemRule[] } = {}) {
	const checks = options.checks ?? {
		ScfShared: makeCheck('ScfShared'),
		ScfNoX: makeCheck('ScfNoX'),
		SCFNoRowTray: makeCheck('SCFNoRowTray'),
		SCFWithdrawn: makeCheck('SCFWithdrawn', { enabled: false }),
	};

	const fresh = options.item ?? makeItem();

	const client = {
		getItemByBarcode: vi.fn().mockResolvedValue(fresh),
		updateItem: vi.fn(options.updateItem ?? ((item: AlmaItem) => Promise.resolve(item))),
	};

	let nextId = 100;

	const queueNotification = vi.fn<NotifierService['queueNotification']>(
		(): Promise<Notification> =>
			Promise.resolve({
				id: nextId++,
				check_id: 1,
				job_id: 'job_test',
				item: '',
				outcome: 'failed',
				status: 'queued',
				container: null,
				blob_name: null,
				recipients: 0,
				error: null,
				created_at: new Date('2025-01-01T00:00:00Z'),
				sent_at: null,
			}),
	);

	const engine = new CheckEngine({
		notifier: { queueNotification },
		checks: { readByName: vi.fn((name: string) => Promise.resolve(checks[name] ?? null)) },
		createClient: () => client as unknown as AlmaClient,
		...(options.rules && { rules: options.rules }),
	});

	return { engine, client, queueNotification };
}

beforeEach(() => {
	vi.clearAllMocks();
	vi.mocked(withLock).mockImplementation((_key, operation) => operation());
});

describe('CheckEngine', () => {
	test('Reports every rule as passed for a clean item', async () => {
		const { engine, queueNotification } = setup({ item: makeItem({ barcode: '32882000000001X' }) });

		await expect(engine.evaluate(makeItem())).resolves.toEqual([
			{ check: 'ScfNoX', status: 'passed' },
			{ check: 'SCFNoRowTray', status: 'passed' },
			{ check: 'SCFWithdrawn', status: 'skipped', reason: 'Check is disabled' },
		]);

		expect(queueNotification).not.toHaveBeenCalled();
	});

	test('Fixes a missing X and notifies with the fixed barcode', async () => {
		const { engine, client, queueNotification } = setup();

		const results = await engine.evaluate(makeItem());

		expect(results[0]).toEqual({
			check: 'ScfNoX',
			status: 'fixed',
			reason: 'Barcode "32882000000001" does not end with X',
			notification_id: 100,
		});
		expect(client.updateItem).toHaveBeenCalledTimes(1);
		expect(queueNotification).toHaveBeenCalledWith({
			check: expect.objectContaining({ name: 'ScfNoX' }),
			item: expect.objectContaining({ item_data: expect.objectContaining({ barcode: '32882000000001X' }) }),
			outcome: 'fixed',
			table: { headers: ['Title', 'Author', 'Barcode'], row: ['A test title', 'Author, Test', '32882000000001X'] },
		});
	});

	test('Passes the fixed item on to later rules', async () => {
		const { engine, queueNotification } = setup({ item: makeItem({ alternative_call_number: null }) });

		const results = await engine.evaluate(makeItem());

		expect(results.map((result) => result.status)).toEqual(['fixed', 'failed', 'skipped']);
		expect(queueNotification.mock.calls[1]?.[0]).toMatchObject({
			outcome: 'failed',
			table: { row: ['A test title', 'Author, Test', '32882000000001X', 'None', 'None'] },
		});
	});

	test('Reports a failed fix as failed with the error', async () => {
		const { engine, queueNotification } = setup({
			updateItem: () => Promise.reject(new Error('Alma is down')),
		});

		const results = await engine.evaluate(makeItem());

		expect(results[0]).toEqual({
			check: 'ScfNoX',
			status: 'failed',
			reason: 'Barcode "32882000000001" does not end with X. Fix failed: Alma is down',
			notification_id: 100,
		});
		expect(queueNotification.mock.calls[0]?.[0]).toMatchObject({
			outcome: 'failed',
			table: { row: ['A test title', 'Author, Test', '32882000000001'] },
		});
	});

	test('Skips rules whose check does not exist', async () => {
		const { engine } = setup({
			checks: { ScfShared: makeCheck('ScfShared'), SCFNoRowTray: makeCheck('SCFNoRowTray') },
			item: makeItem({ barcode: '32882000000001X' }),
		});

		await expect(engine.evaluate(makeItem())).resolves.toEqual([
			{ check: 'ScfNoX', status: 'skipped', reason: 'Check not found' },
			{ check: 'SCFNoRowTray', status: 'passed' },
			{ check: 'SCFWithdrawn', status: 'skipped', reason: 'Check not found' },
		]);
	});

	test('Returns a single skipped result when the shared gate stops the item', async () => {
		const { engine, client } = setup();

		await expect(engine.evaluate(makeItem({ provenance: null }))).resolves.toEqual([
			{ check: 'ScfShared', status: 'skipped', reason: 'Item has no checked provenance' },
		]);

		expect(client.getItemByBarcode).not.toHaveBeenCalled();
	});

	test('Fails a fixable rule when its check has no API key', async () => {
		const { engine, client } = setup({
			checks: {
				ScfShared: makeCheck('ScfShared'),
				ScfNoX: makeCheck('ScfNoX', { api_key: null }),
			},
		});

		const results = await engine.evaluate(makeItem());

		expect(results[0]).toMatchObject({
			check: 'ScfNoX',
			status: 'failed',
			reason: 'Barcode "32882000000001" does not end with X. Fix failed: Check "ScfNoX" has no API key',
		});
		expect(client.updateItem).not.toHaveBeenCalled();
	});

	test('Runs under a lock on the barcode', async () => {
		const { engine } = setup({ item: makeItem({ barcode: '32882000000001X' }) });

		await engine.run(makeItem());

		expect(withLock).toHaveBeenCalledWith('item-check:32882000000001', expect.any(Function), 120000);
	});

	test('Returns null when the barcode is already being checked', async () => {
		vi.mocked(withLock).mockResolvedValue(null);

		const { engine, client } = setup();

		await expect(engine.run(makeItem())).resolves.toBeNull();
		expect(client.getItemByBarcode).not.toHaveBeenCalled();
	});

	test('Rejects items without a barcode', async () => {
		const { engine } = setup();

		await expect(engine.run(makeItem({ barcode: '' }))).rejects.toThrow('Item has no barcode');
	});
});
