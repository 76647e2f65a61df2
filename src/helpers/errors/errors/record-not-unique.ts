import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export interface RecordNotUniqueErrorExtensions {
	collection: string | null;
	field: string | null;
}

export const messageConstructor = ({ field }: RecordNotUniqueErrorExtensions) => {
	return field ? `Value for field "${field}" has to be unique.` : `Value has to be unique.`;
};

export const RecordNotUniqueError = createError<RecordNotUniqueErrorExtensions>(
	ErrorCode.RecordNotUnique,
	messageConstructor,
	400,
);
