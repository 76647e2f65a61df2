import { RecordNotUniqueError } from '../helpers/errors/index.js';
import type { AbstractServiceOptions, MutationOptions, PrimaryKey, User } from '../types/index.js';
import { ItemsService } from './items.js';

export class UsersService extends ItemsService<User> {
	constructor(options: AbstractServiceOptions = {}) {
		super('users', options);
	}

	/**
	 * User email has to be unique case-insensitive. The unique index on lower(email) enforces
	 * the same, this check only produces the nicer error.
	 */
	private async checkUniqueEmail(email: string, excludeKey?: PrimaryKey): Promise<void> {
		const query = this.knex.select('id').from(this.collection).whereRaw('LOWER(??) = ?', ['email', email.toLowerCase()]);

		if (excludeKey !== undefined) {
			query.whereNot('id', excludeKey);
		}

		const results = await this.run<{ id: number }[]>(() => query);

		if (results.length) {
			throw new RecordNotUniqueError({ collection: this.collection, field: 'email' });
		}
	}

	override async createOne(data: Partial<User>): Promise<User> {
		if (data.email) {
			await this.checkUniqueEmail(data.email);
		}

		return super.createOne(data);
	}

	override async updateOne(key: PrimaryKey, data: Partial<User>, opts?: MutationOptions): Promise<User> {
		if (data.email) {
			await this.checkUniqueEmail(data.email, key);
		}

		return super.updateOne(key, data, opts);
	}

	/**
	 * Active users subscribed to a check, in subscription order
	 */
	async getSubscribersForCheck(checkId: PrimaryKey): Promise<User[]> {
		return this.run<User[]>(() =>
			this.knex
				.select('users.*')
				.from(this.collection)
				.join('subscriptions', 'subscriptions.user_id', 'users.id')
				.where('subscriptions.check_id', checkId)
				.andWhere('users.is_active', true)
				.orderBy('subscriptions.id'),
		);
	}
}
