import { isPlainObject } from 'lodash-es';
import { readFileSync } from 'node:fs';

export const readConfigurationFromJson = (path: string): Record<string, unknown> => {
	const config: unknown = JSON.parse(readFileSync(path, 'utf8'));

	if (isPlainObject(config) === false || typeof config !== 'object' || config === null) {
		throw new Error('JSON configuration file does not contain an object');
	}

	return { ...config };
};
