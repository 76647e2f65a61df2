import { Router } from 'express';
import { hasDatabaseConnection } from '../database/index.js';
import { useLogger } from '../helpers/logger/index.js';
import asyncHandler from '../helpers/utils/async-handler.js';
import { useRedis } from '../redis/index.js';

const router = Router();

router.get('/ping', (_req, res) => {
	res.type('text/plain').send('pong');
});

router.get(
	'/health',
	asyncHandler(async (_req, res) => {
		const logger = useLogger();

		const database = await hasDatabaseConnection();

		let redis = false;

		try {
			redis = (await useRedis().ping()) === 'PONG';
		} catch (error) {
			logger.warn({ err: error }, 'Redis health check failed');
		}

		const status = database && redis ? 'ok' : 'error';

		res.status(status === 'ok' ? 200 : 503).json({ status, checks: { database, redis } });
	}),
);

export default router;
