import { afterEach, describe, expect, test, vi } from 'vitest';
import { useEnv } from '../env/index.js';
import { getConfigFromEnv } from './get-config-from-env.js';

vi.mock('../env/index.js');

afterEach(() => {
	vi.clearAllMocks();
});

describe('getConfigFromEnv', () => {
	test('Collects prefixed keys into a camel-cased object', () => {
		vi.mocked(useEnv).mockReturnValue({
			DB_CLIENT: 'pg',
			DB_CONNECTION_STRING: 'postgres://localhost/checks',
			DB_POOL__MIN: 2,
			REDIS_HOST: 'localhost',
		});

		expect(getConfigFromEnv('DB_')).toEqual({
			client: 'pg',
			connectionString: 'postgres://localhost/checks',
			pool: { min: 2 },
		});
	});

	test('Skips omitted keys', () => {
		vi.mocked(useEnv).mockReturnValue({ REDIS_HOST: 'cache', REDIS_ENABLED: true });

		expect(getConfigFromEnv('REDIS', ['REDIS_ENABLED'])).toEqual({ host: 'cache' });
	});
});
