export const tryJson = (value: unknown): unknown => {
	try {
		return JSON.parse(String(value)) as unknown;
	} catch {
		return value;
	}
};
