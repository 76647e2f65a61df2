import asyncHandler from '../helpers/utils/async-handler.js';
import { respond } from '../middleware/respond.js';
import { ChecksService } from '../services/checks.js';
import { UsersService } from '../services/users.js';
import { createItemsRouter, parseId } from './items.js';
import { createCheckSchema, updateCheckSchema } from './schemas/checks.schema.js';

const router = createItemsRouter({
	service: () => new ChecksService(),
	createSchema: createCheckSchema,
	updateSchema: updateCheckSchema,
});

/**
 * Active users who receive this check's emails
 */
router.get(
	'/:id/subscribers',
	asyncHandler(async (req, res, next) => {
		const key = parseId(req.params['id']);

		await new ChecksService().readOne(key);

		const users = await new UsersService().getSubscribersForCheck(key);

		res.locals['payload'] = { data: users };
		return next();
	}),
	respond,
);

export default router;
