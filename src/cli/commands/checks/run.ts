import { closeDatabase } from '../../../database/index.js';
import { useLogger } from '../../../helpers/logger/index.js';
import { closeRedis } from '../../../redis/index.js';
import { NotifierService } from '../../../services/notifier/index.js';
import { NotifierQueue } from '../../../services/queues/implementations/notifier-queue.js';
import { ReportCheckService } from '../../../services/report-checks/index.js';

export default async function checksRun(name: string): Promise<void> {
	const logger = useLogger();

	try {
		const service = new ReportCheckService({ notifier: new NotifierService({ queue: new NotifierQueue() }) });

		const notification = await service.run(name);

		process.stdout.write(notification ? `${notification.job_id}\n` : 'No notification queued\n');

		await closeDatabase();
		await closeRedis();
		process.exit(0);
	} catch (err: unknown) {
		logger.error(err);
		process.exit(1);
	}
}
