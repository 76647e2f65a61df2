import * as http from 'node:http';
import type { Application } from 'express';
import createApp from './app.js';
import { closeDatabase } from './database/index.js';
import { useEnv } from './helpers/env/index.js';
import { useLogger } from './helpers/logger/index.js';
import { closeRedis } from './redis/index.js';
import { startSchedulers, stopSchedulers } from './schedulers/index.js';

export async function createServer(app?: Application): Promise<http.Server> {
	const server = http.createServer(app ?? (await createApp()));

	const env = useEnv();
	server.keepAliveTimeout = Number(env['SERVER_KEEP_ALIVE_TIMEOUT'] ?? 5000);

	return server;
}

export async function startServer(): Promise<void> {
	const env = useEnv();
	const logger = useLogger();

	const server = await createServer();

	const host = String(env['HOST']);
	const port = Number(env['PORT']);

	await startSchedulers();

	server
		.listen(port, host, () => {
			logger.info(`Server started at http://${host}:${port}`);
		})
		.once('error', (err: NodeJS.ErrnoException) => {
			if (err.code === 'EADDRINUSE') {
				logger.error(`Port ${port} is already in use`);
			} else {
				logger.error(err);
			}

			process.exit(1);
		});

	let shuttingDown = false;

	const shutdown = (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;

		logger.info(`${signal} received, shutting down`);

		stopSchedulers();

		server.close((error) => {
			if (error) logger.error(error, 'Error closing the HTTP server');

			Promise.all([closeDatabase(), closeRedis()])
				.then(() => process.exit(0))
				.catch((err: unknown) => {
					logger.error(err, 'Error during shutdown');
					process.exit(1);
				});
		});
	};

	process.once('SIGTERM', () => shutdown('SIGTERM'));
	process.once('SIGINT', () => shutdown('SIGINT'));
}
