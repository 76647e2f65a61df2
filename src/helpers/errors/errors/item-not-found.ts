import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export interface ItemNotFoundErrorExtensions {
	collection: string;
	id: string | number;
}

export const messageConstructor = ({ collection, id }: ItemNotFoundErrorExtensions) =>
	`Item "${id}" doesn't exist in "${collection}".`;

export const ItemNotFoundError = createError<ItemNotFoundErrorExtensions>(ErrorCode.ItemNotFound, messageConstructor, 404);
