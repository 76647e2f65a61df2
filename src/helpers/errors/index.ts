export * from './codes.js';
export * from './create-error.js';
export * from './is-app-error.js';
export * from './types.js';

export { AlmaApiError, type AlmaApiErrorExtensions } from './errors/alma-api.js';
export { ForbiddenError } from './errors/forbidden.js';
export { InvalidForeignKeyError, type InvalidForeignKeyErrorExtensions } from './errors/invalid-foreign-key.js';
export { InvalidPayloadError, type InvalidPayloadErrorExtensions } from './errors/invalid-payload.js';
export { InvalidQueryError, type InvalidQueryErrorExtensions } from './errors/invalid-query.js';
export { InvalidSignatureError } from './errors/invalid-signature.js';
export { ItemNotFoundError, type ItemNotFoundErrorExtensions } from './errors/item-not-found.js';
export { RecordNotUniqueError, type RecordNotUniqueErrorExtensions } from './errors/record-not-unique.js';
export { RouteNotFoundError, type RouteNotFoundErrorExtensions } from './errors/route-not-found.js';
export { ServiceUnavailableError, type ServiceUnavailableErrorExtensions } from './errors/service-unavailable.js';
