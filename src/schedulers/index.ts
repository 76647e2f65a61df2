import { useEnv } from '../helpers/env/index.js';
import { useLogger } from '../helpers/logger/index.js';
import { scheduleLocalJob, scheduleSynchronizedJob, type ScheduledJob } from '../helpers/utils/schedule.js';
import { ChecksService } from '../services/checks.js';
import { NotifierService } from '../services/notifier/index.js';
import { QueueManager } from '../services/queues/queue-manager.js';
import { ReportCheckService } from '../services/report-checks/index.js';

const logger = useLogger();

let jobs: ScheduledJob[] = [];

/** Report jobs by check name, with the rule each was scheduled on */
const reportJobs = new Map<string, { rule: string; job: ScheduledJob }>();

/**
 * Bring the report jobs in line with the checks table. Checks created, rescheduled, disabled or
 * removed through the API are picked up here.
 */
export async function refreshReportSchedules(reports: Pick<ReportCheckService, 'run'>): Promise<void> {
	const env = useEnv();
	const duplicatesSchedule = env['SCF_DUPLICATES_SCHEDULE'];
	const duplicatesCheck = String(env['SCF_DUPLICATES_CHECK_NAME']);

	const wanted = new Map<string, string>();

	if (duplicatesSchedule) {
		wanted.set(duplicatesCheck, String(duplicatesSchedule));
	}

	for (const check of await new ChecksService().readScheduledReports()) {
		if (check.schedule && !wanted.has(check.name)) {
			wanted.set(check.name, check.schedule);
		}
	}

	for (const [name, { rule, job }] of reportJobs) {
		if (wanted.get(name) !== rule) {
			job.stop();
			reportJobs.delete(name);
		}
	}

	for (const [name, rule] of wanted) {
		if (reportJobs.has(name)) continue;

		try {
			const job = scheduleSynchronizedJob(`report-${name}`, rule, async () => {
				await reports.run(name);
			});

			reportJobs.set(name, { rule, job });
		} catch (error) {
			logger.error(error, `Could not schedule report check ${name}`);
		}
	}
}

/**
 * Schedule the queue workers and every report check. Each firing runs on one instance only.
 */
export async function startSchedulers(queueManager = new QueueManager()): Promise<ScheduledJob[]> {
	const env = useEnv();
	const batchSize = Number(env['QUEUE_BATCH_SIZE']);

	const reports = new ReportCheckService({
		notifier: new NotifierService({ queue: queueManager.getNotifierQueue() }),
	});

	jobs.push(
		scheduleSynchronizedJob('process-queues', String(env['QUEUE_PROCESS_SCHEDULE']), async () => {
			await queueManager.processAllQueues(batchSize);
			await queueManager.monitorQueueSizes();
		}),
	);

	jobs.push(
		scheduleSynchronizedJob('process-dead-letter-queue', String(env['DEAD_LETTER_PROCESS_SCHEDULE']), async () => {
			await queueManager.processDeadLetterQueue();
		}),
	);

	await refreshReportSchedules(reports);

	// Every instance keeps its own report jobs current
	jobs.push(
		scheduleLocalJob('refresh-report-schedules', String(env['REPORT_SCHEDULE_REFRESH']), () =>
			refreshReportSchedules(reports),
		),
	);

	const scheduled = [...jobs, ...[...reportJobs.values()].map(({ job }) => job)];

	logger.info(`Scheduled ${scheduled.length} jobs`);

	return scheduled;
}

export function stopSchedulers(): void {
	for (const job of jobs) {
		job.stop();
	}

	for (const { job } of reportJobs.values()) {
		job.stop();
	}

	jobs = [];
	reportJobs.clear();
}
