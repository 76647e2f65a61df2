import type { ErrorRequestHandler } from 'express';
import { ErrorCode, isAppError, type ErrorBody } from '../helpers/errors/index.js';
import { useLogger } from '../helpers/logger/index.js';

// Express recognises error handlers by their four arguments
export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
	const logger = useLogger();

	if (isAppError(err)) {
		if (err.isServerError) {
			logger.error(err, err.message);
		} else {
			logger.debug(err, err.message);
		}

		res.status(err.status).json({ errors: [err.toBody()] });
		return;
	}

	logger.error(err, 'Unhandled error');

	const body: ErrorBody = {
		message: 'An unexpected error occurred.',
		extensions: { code: ErrorCode.Internal },
	};

	res.status(500).json({ errors: [body] });
};
