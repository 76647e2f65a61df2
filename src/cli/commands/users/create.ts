import getDatabase from '../../../database/index.js';
import { useLogger } from '../../../helpers/logger/index.js';
import { UsersService } from '../../../services/users.js';

export default async function usersCreate({ email, inactive }: { email?: string; inactive?: boolean }): Promise<void> {
	const database = getDatabase();
	const logger = useLogger();

	if (!email) {
		logger.error('Email is required');
		process.exit(1);
	}

	try {
		const service = new UsersService({ knex: database });

		const user = await service.createOne({ email, is_active: inactive !== true });
		process.stdout.write(`${String(user.id)}\n`);
		await database.destroy();
		process.exit(0);
	} catch (err: unknown) {
		logger.error(err);
		process.exit(1);
	}
}
