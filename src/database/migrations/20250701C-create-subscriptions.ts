import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
	await knex.schema.createTable('subscriptions', (table) => {
		table.increments('id');
		table.integer('user_id').unsigned().notNullable().references('id').inTable('users').onDelete('CASCADE');
		table.integer('check_id').unsigned().notNullable().references('id').inTable('checks').onDelete('CASCADE');
		table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
		table.unique(['user_id', 'check_id']);
	});
}

export async function down(knex: Knex): Promise<void> {
	await knex.schema.dropTable('subscriptions');
}
