import type { AbstractServiceOptions, Check } from '../types/index.js';
import { ItemsService } from './items.js';

export class ChecksService extends ItemsService<Check> {
	constructor(options: AbstractServiceOptions = {}) {
		super('checks', options);
	}

	async readByName(name: string): Promise<Check | null> {
		const check = await this.run<Check | undefined>(() =>
			this.knex.select('*').from(this.collection).where({ name }).first(),
		);

		return check ?? null;
	}

	/**
	 * Enabled checks that pull an analytics report on a schedule
	 */
	async readScheduledReports(): Promise<Check[]> {
		return this.run<Check[]>(() =>
			this.knex
				.select('*')
				.from(this.collection)
				.where({ enabled: true })
				.whereNotNull('report_path')
				.whereNotNull('schedule')
				.orderBy('id'),
		);
	}
}
