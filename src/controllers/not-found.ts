import type { RequestHandler } from 'express';
import { RouteNotFoundError } from '../helpers/errors/index.js';

const notFound: RequestHandler = (req, _res, next) => {
	next(new RouteNotFoundError({ path: req.path }));
};

export default notFound;
