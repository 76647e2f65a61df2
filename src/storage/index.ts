import { useEnv } from '../helpers/env/index.js';
import { validateEnv } from '../helpers/utils/validate-env.js';
import { registerDrivers } from './register-drivers.js';
import { registerLocations } from './register-locations.js';
import type { StorageManager } from './storage-manager/index.js';

export const _cache: { storage: StorageManager | null } = {
	storage: null,
};

export const getStorage = async (): Promise<StorageManager> => {
	if (_cache.storage) return _cache.storage;

	const env = useEnv();
	const { StorageManager } = await import('./storage-manager/index.js');

	validateEnv(['NOTIFIER_CONTAINER_NAME', 'ACS_SENDER_CONTAINER_NAME']);

	if (env['STORAGE_DRIVER'] === 'azure') {
		validateEnv(['STORAGE_CONNECTION_STRING', 'ACS_SENDER_CONNECTION_STRING']);
	}

	const storage = new StorageManager();

	await registerDrivers(storage);
	await registerLocations(storage);

	_cache.storage = storage;

	return storage;
};
