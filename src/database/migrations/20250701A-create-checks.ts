import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
	await knex.schema.createTable('checks', (table) => {
		table.increments('id');
		table.string('name', 255).notNullable().unique();
		table.string('api_key', 255);
		table.string('report_path', 255);
		table.string('email_subject', 255);
		table.text('email_body');
		table.string('schedule', 100);
		table.boolean('enabled').notNullable().defaultTo(true);
		table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
		table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
	});
}

export async function down(knex: Knex): Promise<void> {
	await knex.schema.dropTable('checks');
}
