import { useEnv } from '../helpers/env/index.js';
import type { StorageManager } from './storage-manager/index.js';

export const NOTIFIER_LOCATION = 'notifier';
export const ACS_SENDER_LOCATION = 'acs';

/**
 * Two locations exist: the notifier container holding report rows and rendered addenda, and the
 * drop-off container of the external email sender. They may live in different storage accounts.
 */
export const registerLocations = async (storage: StorageManager): Promise<void> => {
	const env = useEnv();
	const driver = String(env['STORAGE_DRIVER']);
	// Only the local driver lives below a directory, blobs go to the container root
	const root = driver === 'local' ? { root: String(env['STORAGE_LOCAL_ROOT']) } : {};

	storage.registerLocation(NOTIFIER_LOCATION, {
		driver,
		options: {
			container: String(env['NOTIFIER_CONTAINER_NAME']),
			connectionString: env['STORAGE_CONNECTION_STRING'],
			...root,
		},
	});

	storage.registerLocation(ACS_SENDER_LOCATION, {
		driver,
		options: {
			container: String(env['ACS_SENDER_CONTAINER_NAME']),
			connectionString: env['ACS_SENDER_CONNECTION_STRING'],
			...root,
		},
	});
};
