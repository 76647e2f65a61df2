import type { DriverConstructor } from './storage-manager/index.js';

export const _aliasMap: Record<string, string> = {
	local: './storage-driver-local/index.js',
	azure: './storage-driver-azure/index.js',
};

export const getStorageDriver = async (driverName: string): Promise<DriverConstructor> => {
	const modulePath = _aliasMap[driverName];

	if (modulePath === undefined) {
		throw new Error(`Driver "${driverName}" doesn't exist.`);
	}

	const driverModule: { default: DriverConstructor } = await import(modulePath);

	return driverModule.default;
};
