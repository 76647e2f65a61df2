import { SubscriptionsService } from '../services/subscriptions.js';
import { createItemsRouter } from './items.js';
import { createSubscriptionSchema, updateSubscriptionSchema } from './schemas/subscriptions.schema.js';

export default createItemsRouter({
	service: () => new SubscriptionsService(),
	createSchema: createSubscriptionSchema,
	updateSchema: updateSubscriptionSchema,
});
