import { parse } from 'dotenv';
import { readFileSync } from 'node:fs';

export const readConfigurationFromDotEnv = (path: string): Record<string, unknown> => {
	return parse(readFileSync(path, 'utf8'));
};
