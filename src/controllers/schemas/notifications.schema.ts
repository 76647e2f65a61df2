import Joi from 'joi';
import type { Notification } from '../../types/index.js';

const outcome = Joi.string().valid('failed', 'fixed', 'report');
const status = Joi.string().valid('queued', 'sent', 'skipped', 'failed');

export const createNotificationSchema = Joi.object<Partial<Notification>>({
	check_id: Joi.number().integer().min(1).required(),
	job_id: Joi.string().max(255).required(),
	item: Joi.string().max(255).required(),
	outcome: outcome.required(),
	status,
	container: Joi.string().max(255).allow(null),
	blob_name: Joi.string().max(255).allow(null),
	recipients: Joi.number().integer().min(0),
	error: Joi.string().allow(null),
});

export const updateNotificationSchema = Joi.object<Partial<Notification>>({
	status,
	recipients: Joi.number().integer().min(0),
	error: Joi.string().allow(null),
	sent_at: Joi.date().allow(null),
}).min(1);
