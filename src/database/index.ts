import type { Knex } from 'knex';
import knex from 'knex';
import path, { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { performance } from 'node:perf_hooks';
import { useEnv } from '../helpers/env/index.js';
import { useLogger } from '../helpers/logger/index.js';
import { validateEnv } from '../helpers/utils/validate-env.js';

type QueryInfo = Partial<Knex.Sql> & {
	sql: Knex.Sql['sql'];
	__knexUid: string;
	__knexTxId: string;
};

let database: Knex | null = null;

const __dirname = dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_TABLE = 'knex_migrations';
export const MIGRATIONS_DIRECTORY = path.join(__dirname, 'migrations');

// .js once compiled, .ts when loaded from source
const MIGRATION_EXTENSION = path.extname(fileURLToPath(import.meta.url));

export default getDatabase;

export function getDatabase(): Knex {
	if (database) {
		return database;
	}

	const env = useEnv();
	const logger = useLogger();

	const connectionString = env['DB_CONNECTION_STRING'];

	if (typeof connectionString === 'string') {
		validateEnv(['DB_CLIENT']);
	} else {
		validateEnv(['DB_CLIENT', 'DB_HOST', 'DB_PORT', 'DB_DATABASE', 'DB_USER']);
	}

	const connection: Knex.StaticConnectionConfig | string =
		typeof connectionString === 'string'
			? connectionString
			: {
					host: String(env['DB_HOST']),
					port: Number(env['DB_PORT']),
					database: String(env['DB_DATABASE']),
					user: String(env['DB_USER']),
					password: env['DB_PASSWORD'] === undefined ? '' : String(env['DB_PASSWORD']),
				};

	const knexConfig: Knex.Config = {
		client: String(env['DB_CLIENT']),
		connection,
		log: {
			warn: (msg: string) => logger.warn(msg),
			error: (msg: string) => logger.error(msg),
			deprecate: (msg: string) => logger.info(msg),
			debug: (msg: string) => logger.debug(msg),
		},
		pool: {
			min: Number(env['DB_POOL_MIN'] ?? 0),
			max: Number(env['DB_POOL_MAX'] ?? 10),
		},
		migrations: {
			directory: MIGRATIONS_DIRECTORY,
			tableName: MIGRATIONS_TABLE,
			loadExtensions: [MIGRATION_EXTENSION],
		},
	};

	database = knex.default(knexConfig);

	const times = new Map<string, number>();

	database
		.on('query', ({ __knexUid }: QueryInfo) => {
			times.set(__knexUid, performance.now());
		})
		.on('query-response', (_response: unknown, queryInfo: QueryInfo) => {
			const time = times.get(queryInfo.__knexUid);
			let delta;

			if (time) {
				delta = performance.now() - time;
				times.delete(queryInfo.__knexUid);
			}

			logger.trace(`[${delta ? delta.toFixed(3) : '?'}ms] ${queryInfo.sql} [${(queryInfo.bindings ?? []).join(', ')}]`);
		});

	return database;
}

export async function closeDatabase(): Promise<void> {
	if (!database) return;

	await database.destroy();
	database = null;
}

export async function hasDatabaseConnection(db?: Knex): Promise<boolean> {
	db = db ?? getDatabase();

	try {
		await db.raw('SELECT 1');
		return true;
	} catch {
		return false;
	}
}

export async function validateDatabaseConnection(db?: Knex): Promise<void> {
	db = db ?? getDatabase();
	const logger = useLogger();

	try {
		await db.raw('SELECT 1');
	} catch (error) {
		logger.error(`Can't connect to the database.`);
		logger.error(error);
		process.exit(1);
	}
}

/**
 * Whether every migration shipped with this build has been run
 */
export async function validateMigrations(db?: Knex): Promise<boolean> {
	db = db ?? getDatabase();

	const [, pending]: [unknown[], unknown[]] = await db.migrate.list();

	return pending.length === 0;
}
