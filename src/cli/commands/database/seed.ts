import getDatabase from '../../../database/index.js';
import runSeed from '../../../database/seeds/run.js';
import { useLogger } from '../../../helpers/logger/index.js';

export default async function seed(): Promise<void> {
	const database = getDatabase();
	const logger = useLogger();

	try {
		const inserted = await runSeed(database);

		logger.info(`Seeded ${inserted} rows`);

		await database.destroy();
		process.exit(0);
	} catch (err: unknown) {
		logger.error(err);
		process.exit(1);
	}
}
