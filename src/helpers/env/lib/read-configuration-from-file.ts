import { existsSync } from 'node:fs';
import { getFileExtension } from '../utils/get-file-extension.js';
import { readConfigurationFromDotEnv } from '../utils/read-configuration-from-dotenv.js';
import { readConfigurationFromJson } from '../utils/read-configuration-from-json.js';

/**
 * Read configuration variables from config file
 */
export const readConfigurationFromFile = (path: string): Record<string, unknown> | null => {
	if (existsSync(path) === false) {
		return null;
	}

	const ext = getFileExtension(path);

	if (ext === 'json') {
		return readConfigurationFromJson(path);
	}

	return readConfigurationFromDotEnv(path);
};
