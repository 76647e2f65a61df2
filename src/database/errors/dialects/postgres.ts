import {
	InvalidForeignKeyError,
	InvalidPayloadError,
	RecordNotUniqueError,
} from '../../../helpers/errors/index.js';
import type { PostgresError } from './types.js';

enum PostgresErrorCodes {
	FOREIGN_KEY_VIOLATION = '23503',
	NOT_NULL_VIOLATION = '23502',
	UNIQUE_VIOLATION = '23505',
}

export function extractError(error: PostgresError): PostgresError | Error {
	switch (error.code) {
		case PostgresErrorCodes.UNIQUE_VIOLATION:
			return uniqueViolation(error);
		case PostgresErrorCodes.FOREIGN_KEY_VIOLATION:
			return foreignKeyViolation(error);
		case PostgresErrorCodes.NOT_NULL_VIOLATION:
			return notNullViolation(error);
		default:
			return error;
	}
}

function uniqueViolation(error: PostgresError) {
	const { table, detail } = error;

	// Key (email)=(someone@example.com) already exists.
	const matches = detail?.match(/Key \((.+?)\)=\((.*?)\)/);

	if (!matches) return error;

	const field = matches[1]?.split(', ')[0] ?? null;

	return new RecordNotUniqueError({ collection: table ?? null, field }, { cause: error });
}

function foreignKeyViolation(error: PostgresError) {
	const { table, detail } = error;

	const matches = detail?.match(/Key \((.+?)\)=\((.*?)\)/);

	if (!matches) return error;

	return new InvalidForeignKeyError({ collection: table ?? null, field: matches[1] ?? null }, { cause: error });
}

function notNullViolation(error: PostgresError) {
	const { column } = error;

	if (!column) return error;

	return new InvalidPayloadError({ reason: `"${column}" can't be null` }, { cause: error });
}
