import type { NextFunction, Request, RequestHandler, Response } from 'express';
import express from 'express';
import { useEnv } from '../helpers/env/index.js';
import { InvalidPayloadError } from '../helpers/errors/index.js';

/**
 * JSON body parser that keeps the raw bytes on `req.rawBody` for signature checks
 */
export function jsonBody(): RequestHandler {
	const env = useEnv();

	const parser = express.json({
		limit: String(env['MAX_PAYLOAD_SIZE']),
		verify: (req: Request, _res, buf) => {
			req.rawBody = buf;
		},
	});

	return (req: Request, res: Response, next: NextFunction) => {
		parser(req, res, (err?: unknown) => {
			if (err) {
				const reason = err instanceof Error ? err.message : String(err);
				return next(new InvalidPayloadError({ reason }));
			}

			return next();
		});
	};
}
