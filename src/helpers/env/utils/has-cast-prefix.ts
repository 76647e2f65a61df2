import { ENV_TYPES, type EnvType } from '../constants/env-types.js';

const isEnvType = (value: string): value is EnvType => (ENV_TYPES as readonly string[]).includes(value);

/**
 * Return the explicit cast prefix of a value like `number:8080`, if any
 */
export const getCastFlag = (value: unknown): EnvType | null => {
	if (typeof value !== 'string') return null;

	if (value.includes(':') === false) return null;

	const castPrefix = value.split(':')[0] ?? '';

	if (isEnvType(castPrefix) === false) return null;

	return castPrefix;
};
