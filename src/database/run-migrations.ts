import type { Knex } from 'knex';
import { useLogger } from '../helpers/logger/index.js';

export type MigrationDirection = 'latest' | 'up' | 'down';

export default async function run(database: Knex, direction: MigrationDirection): Promise<void> {
	const logger = useLogger();

	switch (direction) {
		case 'latest': {
			const [batch, log]: [number, string[]] = await database.migrate.latest();
			logger.info(log.length === 0 ? 'Database already up to date' : `Batch ${batch} ran ${log.length} migrations`);
			break;
		}
		case 'up': {
			const [batch, log]: [number, string[]] = await database.migrate.up();
			logger.info(log.length === 0 ? 'Nothing to migrate' : `Batch ${batch} ran ${log.join(', ')}`);
			break;
		}
		case 'down': {
			const [batch, log]: [number, string[]] = await database.migrate.down();
			logger.info(log.length === 0 ? 'Nothing to roll back' : `Batch ${batch} rolled back ${log.join(', ')}`);
			break;
		}
	}
}
