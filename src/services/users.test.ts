import knex, { type Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { RecordNotUniqueError } from '../helpers/errors/index.js';
import { UsersService } from './users.js';

let db: Knex;
let users: UsersService;

beforeEach(async () => {
	db = knex({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });

	await db.schema.createTable('users', (table) => {
		table.increments('id');
		table.string('email').notNullable();
		table.boolean('is_active').notNullable().defaultTo(true);
		table.timestamp('created_at').defaultTo(db.fn.now());
		table.timestamp('updated_at').defaultTo(db.fn.now());
	});

	await db.schema.createTable('subscriptions', (table) => {
		table.increments('id');
		table.integer('user_id').notNullable();
		table.integer('check_id').notNullable();
	});

	users = new UsersService({ knex: db });
});

afterEach(async () => {
	await db.destroy();
});

describe('UsersService', () => {
	test('Rejects an email that differs from an existing one only in case', async () => {
		await users.createOne({ email: 'Reader@Example.org' });

		await expect(users.createOne({ email: 'reader@example.org' })).rejects.toBeInstanceOf(RecordNotUniqueError);
	});

	test('Lets a user change the case of its own email', async () => {
		const created = await users.createOne({ email: 'reader@example.org' });

		await expect(users.updateOne(created.id, { email: 'READER@example.org' })).resolves.toMatchObject({
			id: created.id,
			email: 'READER@example.org',
		});
	});

	test("Rejects taking another user's email on update", async () => {
		await users.createOne({ email: 'first@example.org' });
		const second = await users.createOne({ email: 'second@example.org' });

		await expect(users.updateOne(second.id, { email: 'FIRST@example.org' })).rejects.toBeInstanceOf(
			RecordNotUniqueError,
		);
	});

	test('Lists the active subscribers of a check in subscription order', async () => {
		const late = await users.createOne({ email: 'late@example.org' });
		const early = await users.createOne({ email: 'early@example.org' });
		const inactive = await users.createOne({ email: 'away@example.org', is_active: false });

		await db('subscriptions').insert([
			{ user_id: early.id, check_id: 2 },
			{ user_id: inactive.id, check_id: 2 },
			{ user_id: late.id, check_id: 2 },
			{ user_id: late.id, check_id: 3 },
		]);

		const subscribers = await users.getSubscribersForCheck(2);

		expect(subscribers.map((user) => user.email)).toEqual(['early@example.org', 'late@example.org']);
	});
});
