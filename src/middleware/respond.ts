import type { RequestHandler } from 'express';

/**
 * Send whatever the route left in `res.locals.payload`. Routes without a payload answer 204.
 */
export const respond: RequestHandler = (_req, res) => {
	const payload: unknown = res.locals['payload'];

	if (payload === undefined) {
		res.status(204).end();
		return;
	}

	res.json(payload);
};
