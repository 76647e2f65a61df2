import Joi from 'joi';
import type { User } from '../../types/index.js';

export const createUserSchema = Joi.object<Partial<User>>({
	email: Joi.string().trim().email().max(255).required(),
	is_active: Joi.boolean(),
});

export const updateUserSchema = Joi.object<Partial<User>>({
	email: Joi.string().trim().email().max(255),
	is_active: Joi.boolean(),
}).min(1);
