import { resolve } from 'node:path';
import { ALIASES, DEFAULTS, STRING_KEYS } from '../constants/defaults.js';
import { cast } from '../utils/cast.js';
import { getCastFlag } from '../utils/has-cast-prefix.js';
import { readConfigurationFromFile } from './read-configuration-from-file.js';

export type Env = Record<string, unknown>;

/**
 * Build the environment from defaults, the config file and the process environment, in that order
 */
export const createEnv = (processEnv: NodeJS.ProcessEnv = process.env): Env => {
	const configPath = resolve(processEnv['CONFIG_PATH'] ?? DEFAULTS.CONFIG_PATH);
	const fileConfig = readConfigurationFromFile(configPath) ?? {};

	const raw: Record<string, unknown> = { ...DEFAULTS, ...fileConfig };

	for (const [key, value] of Object.entries(processEnv)) {
		if (value !== undefined) raw[key] = value;
	}

	for (const [key, alias] of Object.entries(ALIASES)) {
		if (raw[key] === undefined && raw[alias] !== undefined) {
			raw[key] = raw[alias];
		}
	}

	const env: Env = {};

	for (const [key, value] of Object.entries(raw)) {
		env[key] = STRING_KEYS.includes(key) && typeof value === 'string' && getCastFlag(value) === null ? value : cast(value);
	}

	return env;
};
