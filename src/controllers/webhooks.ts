import { createHash } from 'node:crypto';
import { Router } from 'express';
import Joi from 'joi';
import { InvalidPayloadError } from '../helpers/errors/index.js';
import { useLogger } from '../helpers/logger/index.js';
import asyncHandler from '../helpers/utils/async-handler.js';
import { respond } from '../middleware/respond.js';
import { validateSignature } from '../middleware/validate-signature.js';
import { ItemCheckQueue } from '../services/queues/implementations/item-check-queue.js';
import { NotifierQueue } from '../services/queues/implementations/notifier-queue.js';
import type { AlmaItem } from '../types/index.js';

const challengeSchema = Joi.object<{ challenge?: string }>({
	challenge: Joi.string(),
}).unknown(true);

// Only the fields routing depends on; the rest of the record is carried through untouched
const itemSchema = Joi.object<{ item: AlmaItem }>({
	item: Joi.object({
		bib_data: Joi.object().unknown(true).default({}),
		holding_data: Joi.object().unknown(true).default({}),
		item_data: Joi.object({
			barcode: Joi.string().trim().min(1).required(),
		})
			.unknown(true)
			.required(),
	})
		.unknown(true)
		.required(),
}).unknown(true);

export type WebhookOptions = {
	queue?: () => Pick<ItemCheckQueue, 'addToQueue'>;
};

export function createWebhookRouter(options: WebhookOptions = {}): Router {
	const logger = useLogger();
	const router = Router();
	const queue = options.queue ?? (() => new ItemCheckQueue(new NotifierQueue()));

	/**
	 * Alma calls the endpoint with a challenge when the webhook integration is activated
	 */
	router.get('/scf', (req, res) => {
		const { value } = challengeSchema.validate(req.query);

		if (value?.challenge !== undefined) {
			res.json({ challenge: value.challenge });
			return;
		}

		res.type('text/plain').send('Webhook endpoint is up');
	});

	router.post(
		'/scf',
		validateSignature,
		asyncHandler(async (req, res, next) => {
			const { error, value } = itemSchema.validate(req.body);

			if (error) throw new InvalidPayloadError({ reason: error.message });

			const barcode = value.item.item_data.barcode ?? '';

			const added = await queue().addToQueue({
				event_id: createHash('sha256').update(req.rawBody ?? JSON.stringify(req.body)).digest('hex'),
				barcode,
				item: value.item,
				received_at: new Date().toISOString(),
			});

			logger.info(`Webhook received for item ${barcode}, ${added ? 'queued' : 'duplicate'}`);

			res.locals['payload'] = { data: { status: added ? 'queued' : 'duplicate' } };
			return next();
		}),
		respond,
	);

	return router;
}

export default createWebhookRouter();
