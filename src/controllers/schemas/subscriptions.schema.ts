import Joi from 'joi';
import type { Subscription } from '../../types/index.js';

export const createSubscriptionSchema = Joi.object<Partial<Subscription>>({
	user_id: Joi.number().integer().min(1).required(),
	check_id: Joi.number().integer().min(1).required(),
});

export const updateSubscriptionSchema = Joi.object<Partial<Subscription>>({
	user_id: Joi.number().integer().min(1),
	check_id: Joi.number().integer().min(1),
}).min(1);
