import Joi from 'joi';
import type { Check } from '../../types/index.js';

const fields = {
	name: Joi.string().trim().max(255),
	api_key: Joi.string().max(255).allow(null),
	report_path: Joi.string().max(255).allow(null),
	email_subject: Joi.string().max(255).allow(null),
	email_body: Joi.string().allow(null),
	schedule: Joi.string().max(100).allow(null),
	enabled: Joi.boolean(),
};

export const createCheckSchema = Joi.object<Partial<Check>>({ ...fields, name: fields.name.required() });

export const updateCheckSchema = Joi.object<Partial<Check>>(fields).min(1);
