import type { Knex } from 'knex';
import getDatabase from '../database/index.js';
import { translateDatabaseError } from '../database/errors/translate.js';
import { ItemNotFoundError } from '../helpers/errors/index.js';
import type { AbstractServiceOptions, Item, MutationOptions, PrimaryKey, Query } from '../types/index.js';

export const DEFAULT_LIMIT = 100;

/**
 * CRUD over a single table. Database errors come out translated into app errors.
 */
export class ItemsService<T extends { id: PrimaryKey } = { id: PrimaryKey } & Item> {
	collection: string;
	knex: Knex;

	constructor(collection: string, options: AbstractServiceOptions = {}) {
		this.collection = collection;
		this.knex = options.knex ?? getDatabase();
	}

	async createOne(data: Partial<T>): Promise<T> {
		const [created] = await this.run<T[]>(() => this.knex(this.collection).insert(data).returning('*'));

		if (!created) {
			throw new Error(`Insert into "${this.collection}" returned no row`);
		}

		return created;
	}

	async readByQuery(query: Query = {}): Promise<T[]> {
		const dbQuery = this.knex
			.select('*')
			.from(this.collection)
			.orderBy('id')
			.offset(query.skip ?? 0)
			.limit(query.limit ?? DEFAULT_LIMIT);

		if (query.filter) {
			dbQuery.where(query.filter);
		}

		return this.run<T[]>(() => dbQuery);
	}

	async readOne(key: PrimaryKey): Promise<T> {
		const record = await this.run<T | undefined>(() => this.knex.select('*').from(this.collection).where({ id: key }).first());

		if (!record) {
			throw new ItemNotFoundError({ collection: this.collection, id: key });
		}

		return record;
	}

	async updateOne(key: PrimaryKey, data: Partial<T>, opts: MutationOptions = {}): Promise<T> {
		if (!opts.skipExistenceCheck) {
			await this.readOne(key);
		}

		const payload = 'updated_at' in data || !(await this.hasUpdatedAt()) ? data : { ...data, updated_at: new Date() };

		const [updated] = await this.run<T[]>(() =>
			this.knex(this.collection).update(payload).where({ id: key }).returning('*'),
		);

		if (!updated) {
			throw new ItemNotFoundError({ collection: this.collection, id: key });
		}

		return updated;
	}

	async deleteOne(key: PrimaryKey): Promise<PrimaryKey> {
		const deleted = await this.run<number>(() => this.knex(this.collection).where({ id: key }).delete());

		if (deleted === 0) {
			throw new ItemNotFoundError({ collection: this.collection, id: key });
		}

		return key;
	}

	private updatedAtColumn: boolean | null = null;

	private async hasUpdatedAt(): Promise<boolean> {
		if (this.updatedAtColumn === null) {
			this.updatedAtColumn = await this.knex.schema.hasColumn(this.collection, 'updated_at');
		}

		return this.updatedAtColumn;
	}

	protected async run<R>(query: () => PromiseLike<R>): Promise<R> {
		try {
			return await query();
		} catch (error) {
			throw translateDatabaseError(error);
		}
	}
}
