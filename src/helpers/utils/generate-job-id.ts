import { randomUUID } from 'node:crypto';

/**
 * Job ids look like `job_ScfNoX_20250101120000_1a2b3c4d` (UTC timestamp, 8 random hex chars)
 */
export function generateJobId(checkName: string, now: Date = new Date()): string {
	const timestamp = now
		.toISOString()
		.replace(/\.\d{3}Z$/, '')
		.replace(/[-:T]/g, '');

	const uniqueId = randomUUID().slice(0, 8);

	return `job_${checkName}_${timestamp}_${uniqueId}`;
}
