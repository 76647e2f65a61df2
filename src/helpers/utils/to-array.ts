export function toArray(val: string): string[];
export function toArray<T>(val: T | T[]): T[];
export function toArray<T>(val: T | T[] | string): (T | string)[] {
	if (typeof val === 'string') {
		return val
			.split(',')
			.map((part) => part.trim())
			.filter((part) => part !== '');
	}

	return Array.isArray(val) ? val : [val];
}
