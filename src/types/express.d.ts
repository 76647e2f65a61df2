export {};

declare global {
	namespace Express {
		export interface Request {
			/** Unparsed request body, kept for signature validation */
			rawBody?: Buffer;
		}
	}
}
