import getDatabase from '../../../database/index.js';
import run, { type MigrationDirection } from '../../../database/run-migrations.js';
import { useLogger } from '../../../helpers/logger/index.js';

export default async function migrate(direction: MigrationDirection): Promise<void> {
	const database = getDatabase();
	const logger = useLogger();

	try {
		logger.info('Running migrations...');

		await run(database, direction);

		await database.destroy();
		process.exit(0);
	} catch (err: unknown) {
		logger.error(err);
		process.exit(1);
	}
}
