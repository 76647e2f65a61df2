import express from 'express';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { ItemNotFoundError, RecordNotUniqueError } from '../helpers/errors/index.js';
import { errorHandler } from '../middleware/error-handler.js';
import { jsonBody } from '../middleware/raw-body.js';
import type { ItemsService } from '../services/items.js';
import type { Check } from '../types/index.js';
import { createItemsRouter } from './items.js';
import { createCheckSchema, updateCheckSchema } from './schemas/checks.schema.js';

const check = {
	id: 1,
	name: 'ScfNoX',
	api_key: null,
	report_path: null,
	email_subject: 'Barcodes fixed',
	email_body: null,
	schedule: null,
	enabled: true,
};

let server: Server | null = null;

afterEach(() => {
	server?.close();
	server = null;
});

async function start() {
	const service = {
		createOne: vi.fn((data: Partial<Check>) => Promise.resolve({ ...check, ...data })),
		readByQuery: vi.fn().mockResolvedValue([check]),
		readOne: vi.fn((key: number) =>
			key === 1 ? Promise.resolve(check) : Promise.reject(new ItemNotFoundError({ collection: 'checks', id: key })),
		),
		updateOne: vi.fn((key: number, data: Partial<Check>) => Promise.resolve({ ...check, ...data, id: key })),
		deleteOne: vi.fn((key: number) => Promise.resolve(key)),
	};

	const app = express();
	app.use(jsonBody());
	app.use(
		'/api/checks',
		createItemsRouter<Check>({
			service: () => service as unknown as ItemsService<Check>,
			createSchema: createCheckSchema,
			updateSchema: updateCheckSchema,
		}),
	);
	app.use(errorHandler);

	server = app.listen(0, '127.0.0.1');
	await once(server, 'listening');

	const address = server.address();
	const port = typeof address === 'object' && address !== null ? address.port : 0;

	return { url: `http://127.0.0.1:${port}/api/checks`, service };
}

function send(url: string, method: string, payload: unknown) {
	return fetch(url, { method, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) });
}

describe('items router', () => {
	test('Creates an item', async () => {
		const { url, service } = await start();

		const response = await send(url, 'POST', { name: 'SCFNew', enabled: false });

		expect(response.status).toBe(201);
		await expect(response.json()).resolves.toMatchObject({ data: { name: 'SCFNew', enabled: false } });
		expect(service.createOne).toHaveBeenCalledWith({ name: 'SCFNew', enabled: false });
	});

	test('Rejects a create without the required fields', async () => {
		const { url, service } = await start();

		const response = await send(url, 'POST', { enabled: true });

		expect(response.status).toBe(400);
		await expect(response.json()).resolves.toEqual({
			errors: [
				{
					message: 'Invalid payload. "name" is required.',
					extensions: { code: 'INVALID_PAYLOAD', reason: '"name" is required' },
				},
			],
		});
		expect(service.createOne).not.toHaveBeenCalled();
	});

	test('Lists with default paging', async () => {
		const { url, service } = await start();

		const response = await fetch(url);

		await expect(response.json()).resolves.toEqual({ data: [check] });
		expect(service.readByQuery).toHaveBeenCalledWith({ skip: 0, limit: 100 });
	});

	test('Passes skip and limit through', async () => {
		const { url, service } = await start();

		await fetch(`${url}?skip=20&limit=5`);

		expect(service.readByQuery).toHaveBeenCalledWith({ skip: 20, limit: 5 });
	});

	test('Rejects a limit above 1000', async () => {
		const { url } = await start();

		const response = await fetch(`${url}?limit=1001`);

		expect(response.status).toBe(400);
		await expect(response.json()).resolves.toMatchObject({ errors: [{ extensions: { code: 'INVALID_QUERY' } }] });
	});

	test('Reads one item and answers 404 for unknown ids', async () => {
		const { url } = await start();

		await expect((await fetch(`${url}/1`)).json()).resolves.toEqual({ data: check });

		const missing = await fetch(`${url}/9`);
		expect(missing.status).toBe(404);
		await expect(missing.json()).resolves.toEqual({
			errors: [
				{
					message: 'Item "9" doesn\'t exist in "checks".',
					extensions: { code: 'ITEM_NOT_FOUND', collection: 'checks', id: 9 },
				},
			],
		});
	});

	test('Rejects ids that are not positive integers', async () => {
		const { url, service } = await start();

		const response = await fetch(`${url}/abc`);

		expect(response.status).toBe(400);
		expect(service.readOne).not.toHaveBeenCalled();
	});

	test('Updates with PATCH and PUT', async () => {
		const { url, service } = await start();

		const patched = await send(`${url}/1`, 'PATCH', { enabled: false });
		await expect(patched.json()).resolves.toMatchObject({ data: { id: 1, enabled: false } });

		await send(`${url}/1`, 'PUT', { email_subject: 'New subject' });

		expect(service.updateOne).toHaveBeenNthCalledWith(1, 1, { enabled: false });
		expect(service.updateOne).toHaveBeenNthCalledWith(2, 1, { email_subject: 'New subject' });
	});

	test('Rejects an empty update', async () => {
		const { url } = await start();

		const response = await send(`${url}/1`, 'PATCH', {});

		expect(response.status).toBe(400);
	});

	test('Deletes with 204', async () => {
		const { url, service } = await start();

		const response = await fetch(`${url}/1`, { method: 'DELETE' });

		expect(response.status).toBe(204);
		expect(service.deleteOne).toHaveBeenCalledWith(1);
	});

	test('Maps unique violations to 400', async () => {
		const { url, service } = await start();
		service.createOne.mockRejectedValueOnce(new RecordNotUniqueError({ collection: 'checks', field: 'name' }));

		const response = await send(url, 'POST', { name: 'ScfNoX' });

		expect(response.status).toBe(400);
		await expect(response.json()).resolves.toMatchObject({
			errors: [{ extensions: { code: 'RECORD_NOT_UNIQUE', collection: 'checks', field: 'name' } }],
		});
	});
});
