import Joi from 'joi';
import { DEFAULT_LIMIT } from '../../services/items.js';

export const MAX_LIMIT = 1000;

export const listQuerySchema = Joi.object<{ skip: number; limit: number }>({
	skip: Joi.number().integer().min(0).default(0),
	limit: Joi.number().integer().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
});

export const idSchema = Joi.number().integer().min(1).required();
