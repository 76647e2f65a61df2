import { pino, type Logger, type LoggerOptions } from 'pino';
import { pinoHttp, type HttpLogger } from 'pino-http';
import { useEnv } from '../env/index.js';
import { toArray } from '../utils/to-array.js';

let logger: Logger | null = null;

export const _cache = {
	reset() {
		logger = null;
	},
};

export const useLogger = (): Logger => {
	if (logger) return logger;

	logger = createLogger();

	return logger;
};

export const createLogger = (): Logger => {
	const env = useEnv();

	const loggerOptions: LoggerOptions = {
		level: String(env['LOG_LEVEL']),
		redact: {
			paths: ['req.headers.authorization', 'req.headers["x-exl-signature"]', 'req.headers.cookie'],
			censor: '--redact--',
		},
	};

	return pino(loggerOptions);
};

export const createExpressLogger = (): HttpLogger => {
	const env = useEnv();
	const ignoredPaths = toArray(String(env['LOG_HTTP_IGNORE_PATHS'] ?? ''));

	return pinoHttp({
		logger: useLogger(),
		autoLogging: {
			ignore: (req) => ignoredPaths.includes(req.url?.split('?')[0] ?? ''),
		},
	});
};
