import type { RequestHandler } from 'express';
import { useEnv } from '../helpers/env/index.js';
import { InvalidSignatureError } from '../helpers/errors/index.js';
import { isValidSignature } from '../helpers/utils/webhook-signature.js';

export const SIGNATURE_HEADER = 'x-exl-signature';

/**
 * Reject webhook calls whose `X-Exl-Signature` doesn't match the raw body
 */
export const validateSignature: RequestHandler = (req, _res, next) => {
	const env = useEnv();
	const secret = env['SCF_WEBHOOK_SECRET'];
	const key = secret === undefined || secret === null ? undefined : String(secret);
	const body = req.rawBody ?? Buffer.alloc(0);

	if (!isValidSignature(body, key, req.get(SIGNATURE_HEADER))) {
		return next(new InvalidSignatureError());
	}

	return next();
};
