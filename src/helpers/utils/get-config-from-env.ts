import { camelCase, set } from 'lodash-es';
import { useEnv } from '../env/index.js';

/**
 * Collect all env vars starting with the prefix into an options object, camel-casing the keys.
 * A double underscore nests: `DB_POOL__MIN=2` becomes `{ pool: { min: 2 } }`.
 */
export function getConfigFromEnv(prefix: string, omitKeys: string[] = []): Record<string, unknown> {
	const env = useEnv();

	const config: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(env)) {
		if (key.toLowerCase().startsWith(prefix.toLowerCase()) === false) continue;
		if (omitKeys.includes(key)) continue;

		const path = key
			.slice(prefix.length)
			.replace(/^_/, '')
			.split('__')
			.map((part) => camelCase(part));

		if (path.length === 0 || path[0] === '') continue;

		set(config, path, value);
	}

	return config;
}
