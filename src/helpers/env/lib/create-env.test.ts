import { describe, expect, test } from 'vitest';
import { createEnv } from './create-env.js';

const CONFIG_PATH = './does-not-exist.env';

describe('createEnv', () => {
	test('Casts ordinary values', () => {
		const env = createEnv({ CONFIG_PATH, PORT: '3000', DISABLE_EMAIL: 'true' });

		expect(env['PORT']).toBe(3000);
		expect(env['DISABLE_EMAIL']).toBe(true);
	});

	test('Keeps secrets as the configured strings', () => {
		const env = createEnv({ CONFIG_PATH, SCF_WEBHOOK_SECRET: '12345678', API_TOKEN: 'null', REDIS_PASSWORD: 'true' });

		expect(env['SCF_WEBHOOK_SECRET']).toBe('12345678');
		expect(env['API_TOKEN']).toBe('null');
		expect(env['REDIS_PASSWORD']).toBe('true');
	});

	test('Still honours an explicit cast prefix on a secret', () => {
		const env = createEnv({ CONFIG_PATH, SCF_WEBHOOK_SECRET: 'string:0042' });

		expect(env['SCF_WEBHOOK_SECRET']).toBe('0042');
	});

	test('Reads legacy aliases', () => {
		const env = createEnv({ CONFIG_PATH, SQLALCHEMY_CONNECTION_STRING: 'postgres://app:test-password@db/checks' });

		expect(env['DB_CONNECTION_STRING']).toBe('postgres://app:test-password@db/checks');
	});
});
