import { Command } from 'commander';
import { startServer } from '../server.js';
import checksRun from './commands/checks/run.js';
import dbMigrate from './commands/database/migrate.js';
import dbSeed from './commands/database/seed.js';
import usersCreate from './commands/users/create.js';
import worker from './commands/worker/index.js';

export async function createCli(): Promise<Command> {
	const program = new Command();

	program.name('alma-item-checks').usage('[command] [options]');

	program.command('start').description('Start the API and the schedulers').action(startServer);

	program
		.command('worker')
		.description('Drain the item check and notifier queues once')
		.option('--dead-letter', 'requeue recent dead letter items first')
		.action(worker);

	const dbCommand = program.command('database');

	dbCommand
		.command('migrate:latest')
		.description('Upgrade the database')
		.action(() => dbMigrate('latest'));

	dbCommand
		.command('migrate:up')
		.description('Upgrade the database')
		.action(() => dbMigrate('up'));

	dbCommand
		.command('migrate:down')
		.description('Downgrade the database')
		.action(() => dbMigrate('down'));

	dbCommand.command('seed').description('Insert the built-in checks').action(dbSeed);

	const usersCommand = program.command('users');

	usersCommand
		.command('create')
		.description('Create a new user')
		.option('--email <value>', `user's email`)
		.option('--inactive', 'create the user without email delivery')
		.action(usersCreate);

	const checksCommand = program.command('checks');

	checksCommand.command('run <name>').description('Run a report check now').action(checksRun);

	return program;
}
