import type { Knex } from 'knex';

export type AbstractServiceOptions = {
	knex?: Knex | undefined;
};

export type MutationOptions = {
	/** Skip the existence check before an update or delete */
	skipExistenceCheck?: boolean;
};
