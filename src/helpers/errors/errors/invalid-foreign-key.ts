import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export interface InvalidForeignKeyErrorExtensions {
	collection: string | null;
	field: string | null;
}

export const messageConstructor = ({ field }: InvalidForeignKeyErrorExtensions) => {
	return field ? `Invalid foreign key for field "${field}".` : `Invalid foreign key.`;
};

export const InvalidForeignKeyError = createError<InvalidForeignKeyErrorExtensions>(
	ErrorCode.InvalidForeignKey,
	messageConstructor,
	400,
);
