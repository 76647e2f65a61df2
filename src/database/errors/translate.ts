import { extractError as postgres } from './dialects/postgres.js';
import type { SQLError } from './dialects/types.js';

function isSQLError(error: unknown): error is SQLError {
	return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Translates an error thrown by the database driver into one of the app errors. Currently
 * supports:
 * - Invalid Foreign Key
 * - Not Null Violation
 * - Record Not Unique
 *
 * Anything else is returned untouched.
 */
export function translateDatabaseError(error: unknown): unknown {
	if (!isSQLError(error)) return error;

	return postgres(error);
}
