import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';
import { useEnv } from '../env/index.js';
import { useLogger } from '../logger/index.js';

export async function validateStorage(): Promise<void> {
	const env = useEnv();
	const logger = useLogger();

	if (env['STORAGE_DRIVER'] === 'local') {
		const root = String(env['STORAGE_LOCAL_ROOT']);

		try {
			await access(root, constants.R_OK | constants.W_OK);
		} catch {
			logger.warn(`Storage directory (${path.resolve(root)}) is not read/writeable!`);
		}
	}
}
