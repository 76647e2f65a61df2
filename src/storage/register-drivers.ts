import { useEnv } from '../helpers/env/index.js';
import { getStorageDriver } from './get-storage-driver.js';
import type { StorageManager } from './storage-manager/index.js';

export const registerDrivers = async (storage: StorageManager): Promise<void> => {
	const env = useEnv();
	const driverName = String(env['STORAGE_DRIVER']);

	const storageDriver = await getStorageDriver(driverName);

	storage.registerDriver(driverName, storageDriver);
};
