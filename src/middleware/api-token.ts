import { timingSafeEqual } from 'node:crypto';
import type { RequestHandler } from 'express';
import { useEnv } from '../helpers/env/index.js';
import { ForbiddenError } from '../helpers/errors/index.js';

function sameToken(expected: string, received: string): boolean {
	const a = Buffer.from(expected);
	const b = Buffer.from(received);

	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `Authorization: Bearer <API_TOKEN>` when API_TOKEN is configured
 */
export const apiToken: RequestHandler = (req, _res, next) => {
	const env = useEnv();
	const token = env['API_TOKEN'];

	if (token === undefined || token === null || token === '') return next();

	const header = req.get('authorization') ?? '';
	const [scheme, received] = header.split(' ');

	if (scheme?.toLowerCase() !== 'bearer' || !received || !sameToken(String(token), received)) {
		return next(new ForbiddenError());
	}

	return next();
};
