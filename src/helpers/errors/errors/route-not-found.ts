import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export interface RouteNotFoundErrorExtensions {
	path: string;
}

export const messageConstructor = ({ path }: RouteNotFoundErrorExtensions) => `Route ${path} doesn't exist.`;

export const RouteNotFoundError = createError<RouteNotFoundErrorExtensions>(ErrorCode.RouteNotFound, messageConstructor, 404);
