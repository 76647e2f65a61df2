import type { AppError } from './create-error.js';
import type { ExtensionsMap } from './types.js';

/**
 * Check whether or not a passed value is an error created through `createError`.
 *
 * @param value - Any value
 * @param code - Error code to check for
 */
export const isAppError = <T = never, C extends string = string>(
	value: unknown,
	code?: C,
): value is AppError<[T] extends [never] ? (C extends keyof ExtensionsMap ? ExtensionsMap[C] : unknown) : T> => {
	const isAppError =
		typeof value === 'object' &&
		value !== null &&
		Array.isArray(value) === false &&
		'name' in value &&
		value.name === 'AppError';

	if (code) {
		return isAppError && 'code' in value && value.code === code.toUpperCase();
	}

	return isAppError;
};
