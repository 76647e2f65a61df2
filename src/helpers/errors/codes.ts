export enum ErrorCode {
	AlmaApi = 'ALMA_API',
	Forbidden = 'FORBIDDEN',
	Internal = 'INTERNAL',
	InvalidForeignKey = 'INVALID_FOREIGN_KEY',
	InvalidPayload = 'INVALID_PAYLOAD',
	InvalidQuery = 'INVALID_QUERY',
	InvalidSignature = 'INVALID_SIGNATURE',
	ItemNotFound = 'ITEM_NOT_FOUND',
	RecordNotUnique = 'RECORD_NOT_UNIQUE',
	RouteNotFound = 'ROUTE_NOT_FOUND',
	ServiceUnavailable = 'SERVICE_UNAVAILABLE',
}
