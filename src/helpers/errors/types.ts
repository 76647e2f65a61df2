import type { ErrorCode } from './codes.js';
import type { AlmaApiErrorExtensions } from './errors/alma-api.js';
import type { InvalidForeignKeyErrorExtensions } from './errors/invalid-foreign-key.js';
import type { InvalidPayloadErrorExtensions } from './errors/invalid-payload.js';
import type { InvalidQueryErrorExtensions } from './errors/invalid-query.js';
import type { ItemNotFoundErrorExtensions } from './errors/item-not-found.js';
import type { RecordNotUniqueErrorExtensions } from './errors/record-not-unique.js';
import type { RouteNotFoundErrorExtensions } from './errors/route-not-found.js';
import type { ServiceUnavailableErrorExtensions } from './errors/service-unavailable.js';

export type ExtensionsMap = {
	[ErrorCode.AlmaApi]: AlmaApiErrorExtensions;
	[ErrorCode.Forbidden]: void;
	[ErrorCode.Internal]: void;
	[ErrorCode.InvalidForeignKey]: InvalidForeignKeyErrorExtensions;
	[ErrorCode.InvalidPayload]: InvalidPayloadErrorExtensions;
	[ErrorCode.InvalidQuery]: InvalidQueryErrorExtensions;
	[ErrorCode.InvalidSignature]: void;
	[ErrorCode.ItemNotFound]: ItemNotFoundErrorExtensions;
	[ErrorCode.RecordNotUnique]: RecordNotUniqueErrorExtensions;
	[ErrorCode.RouteNotFound]: RouteNotFoundErrorExtensions;
	[ErrorCode.ServiceUnavailable]: ServiceUnavailableErrorExtensions;
};
