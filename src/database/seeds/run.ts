import fse from 'fs-extra';
import yaml from 'js-yaml';
import type { Knex } from 'knex';
import path, { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { useLogger } from '../../helpers/logger/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

type TableSeed = {
	table: string;
	/** Column identifying an existing row; seeded rows never overwrite it */
	key: string;
	rows: Record<string, Knex.Value>[];
};

function isTableSeed(value: unknown): value is TableSeed {
	if (typeof value !== 'object' || value === null) return false;

	return (
		'table' in value &&
		typeof value.table === 'string' &&
		'key' in value &&
		typeof value.key === 'string' &&
		'rows' in value &&
		Array.isArray(value.rows)
	);
}

export default async function runSeed(database: Knex): Promise<number> {
	const logger = useLogger();
	const seedFiles = await fse.readdir(path.resolve(__dirname));
	let inserted = 0;

	for (const seedFile of seedFiles) {
		if (!seedFile.endsWith('.yaml')) continue;

		const yamlRaw = await fse.readFile(path.resolve(__dirname, seedFile), 'utf8');
		const seedData = yaml.load(yamlRaw);

		if (!isTableSeed(seedData)) {
			throw new Error(`Seed file "${seedFile}" is malformed`);
		}

		for (const row of seedData.rows) {
			const keyValue = row[seedData.key];

			const existing = await database(seedData.table).select('id').where(seedData.key, keyValue).first();

			if (existing) {
				logger.debug(`${seedData.table} "${String(keyValue)}" already exists, skipping...`);
				continue;
			}

			await database(seedData.table).insert(row);
			inserted++;
		}
	}

	return inserted;
}
