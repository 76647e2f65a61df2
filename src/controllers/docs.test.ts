import { describe, expect, test } from 'vitest';
import { isObject } from '../helpers/utils/is-object.js';
import { getOpenApiDocument } from './docs.js';

describe('getOpenApiDocument', () => {
	test('Loads the OpenAPI document with every resource path', async () => {
		const document = await getOpenApiDocument();

		const paths = document['paths'];

		expect(document['openapi']).toBe('3.0.3');
		expect(isObject(paths) ? Object.keys(paths) : []).toEqual(
			expect.arrayContaining([
				'/api/checks',
				'/api/checks/{id}',
				'/api/checks/{id}/subscribers',
				'/api/users',
				'/api/subscriptions',
				'/api/notifications',
				'/webhooks/scf',
				'/server/health',
			]),
		);
	});
});
