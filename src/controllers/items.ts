import { Router } from 'express';
import type { ObjectSchema } from 'joi';
import { InvalidPayloadError, InvalidQueryError } from '../helpers/errors/index.js';
import asyncHandler from '../helpers/utils/async-handler.js';
import { respond } from '../middleware/respond.js';
import type { ItemsService } from '../services/items.js';
import type { PrimaryKey } from '../types/index.js';
import { idSchema, listQuerySchema } from './schemas/query.schema.js';

export type ItemsRouterOptions<T extends { id: PrimaryKey }> = {
	service: () => ItemsService<T>;
	createSchema: ObjectSchema<Partial<T>>;
	updateSchema: ObjectSchema<Partial<T>>;
};

export function parseId(raw: string | undefined): PrimaryKey {
	const { error, value } = idSchema.validate(raw);

	if (error || typeof value !== 'number') {
		throw new InvalidQueryError({ reason: `"${raw ?? ''}" is not a valid id` });
	}

	return value;
}

/**
 * Standard create / list / read / update / delete routes for a collection
 */
export function createItemsRouter<T extends { id: PrimaryKey }>(options: ItemsRouterOptions<T>): Router {
	const router = Router();

	router.post(
		'/',
		asyncHandler(async (req, res, next) => {
			const { error, value } = options.createSchema.validate(req.body);

			if (error) throw new InvalidPayloadError({ reason: error.message });

			const item = await options.service().createOne(value);

			res.status(201);
			res.locals['payload'] = { data: item };
			return next();
		}),
		respond,
	);

	router.get(
		'/',
		asyncHandler(async (req, res, next) => {
			const { error, value } = listQuerySchema.validate(req.query);

			if (error) throw new InvalidQueryError({ reason: error.message });

			const items = await options.service().readByQuery({ skip: value.skip, limit: value.limit });

			res.locals['payload'] = { data: items };
			return next();
		}),
		respond,
	);

	router.get(
		'/:id',
		asyncHandler(async (req, res, next) => {
			const item = await options.service().readOne(parseId(req.params['id']));

			res.locals['payload'] = { data: item };
			return next();
		}),
		respond,
	);

	const update = asyncHandler(async (req, res, next) => {
		const key = parseId(req.params['id']);
		const { error, value } = options.updateSchema.validate(req.body);

		if (error) throw new InvalidPayloadError({ reason: error.message });

		const item = await options.service().updateOne(key, value);

		res.locals['payload'] = { data: item };
		return next();
	});

	router.patch('/:id', update, respond);
	router.put('/:id', update, respond);

	router.delete(
		'/:id',
		asyncHandler(async (req, _res, next) => {
			await options.service().deleteOne(parseId(req.params['id']));
			return next();
		}),
		respond,
	);

	return router;
}
