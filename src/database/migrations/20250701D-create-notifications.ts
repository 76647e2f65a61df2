import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
	await knex.schema.createTable('notifications', (table) => {
		table.increments('id');
		table.integer('check_id').unsigned().notNullable().references('id').inTable('checks').onDelete('CASCADE');
		table.string('job_id', 255).notNullable().unique();
		table.string('item', 255).notNullable();
		table.string('outcome', 20).notNullable();
		table.string('status', 20).notNullable().defaultTo('queued');
		table.string('container', 255);
		table.string('blob_name', 255);
		table.integer('recipients').notNullable().defaultTo(0);
		table.text('error');
		table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
		table.timestamp('sent_at');

		table.index(['check_id']);
		table.index(['status']);
	});
}

export async function down(knex: Knex): Promise<void> {
	await knex.schema.dropTable('notifications');
}
