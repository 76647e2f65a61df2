import express from 'express';
import helmet from 'helmet';
import { merge } from 'lodash-es';
import checksRouter from './controllers/checks.js';
import docsRouter from './controllers/docs.js';
import notFoundHandler from './controllers/not-found.js';
import notificationsRouter from './controllers/notifications.js';
import serverRouter from './controllers/server.js';
import subscriptionsRouter from './controllers/subscriptions.js';
import usersRouter from './controllers/users.js';
import webhooksRouter from './controllers/webhooks.js';
import { validateDatabaseConnection, validateMigrations } from './database/index.js';
import { useEnv } from './helpers/env/index.js';
import { createExpressLogger, useLogger } from './helpers/logger/index.js';
import { getConfigFromEnv } from './helpers/utils/get-config-from-env.js';
import { validateEnv } from './helpers/utils/validate-env.js';
import { validateStorage } from './helpers/utils/validate-storage.js';
import { apiToken } from './middleware/api-token.js';
import { errorHandler } from './middleware/error-handler.js';
import { jsonBody } from './middleware/raw-body.js';

export const REQUIRED_KEYS = [
	'SCF_WEBHOOK_SECRET',
	'NOTIFIER_QUEUE_NAME',
	'NOTIFIER_CONTAINER_NAME',
	'ACS_SENDER_CONTAINER_NAME',
];

export default async function createApp(): Promise<express.Application> {
	const env = useEnv();
	const logger = useLogger();

	validateEnv(REQUIRED_KEYS);

	await validateDatabaseConnection();

	if ((await validateMigrations()) === false) {
		logger.warn(`Database migrations have not all been run`);
	}

	await validateStorage();

	if (!env['API_TOKEN']) {
		logger.warn(`"API_TOKEN" is not set. The /api routes are open to anybody who can reach the server.`);
	}

	const app = express();

	app.disable('x-powered-by');
	app.set('trust proxy', env['IP_TRUST_PROXY'] ?? false);

	app.use(
		helmet.contentSecurityPolicy(
			merge(
				{
					useDefaults: true,
					directives: {
						// Swagger UI and ReDoc load from their CDNs
						scriptSrc: ["'self'", "'unsafe-inline'", 'https://unpkg.com', 'https://cdn.redoc.ly'],
						styleSrc: ["'self'", "'unsafe-inline'", 'https://unpkg.com', 'https://fonts.googleapis.com'],
						workerSrc: ["'self'", 'blob:'],
						imgSrc: ["'self'", 'data:', 'https://cdn.redoc.ly'],
						upgradeInsecureRequests: null,
					},
				},
				getConfigFromEnv('CONTENT_SECURITY_POLICY_'),
			),
		),
	);

	if (env['HSTS_ENABLED']) {
		const hsts = getConfigFromEnv('HSTS_', ['HSTS_ENABLED']);

		app.use(
			helmet.hsts({
				maxAge: Number(hsts['maxAge'] ?? 15552000),
				includeSubDomains: hsts['includeSubDomains'] !== false,
				preload: hsts['preload'] === true,
			}),
		);
	}

	app.use(createExpressLogger());

	app.use(jsonBody());

	app.use('/server', serverRouter);
	app.use('/webhooks', webhooksRouter);

	app.use('/api', docsRouter);
	app.use('/api', apiToken);
	app.use('/api/checks', checksRouter);
	app.use('/api/users', usersRouter);
	app.use('/api/subscriptions', subscriptionsRouter);
	app.use('/api/notifications', notificationsRouter);

	app.use(notFoundHandler);
	app.use(errorHandler);

	return app;
}
