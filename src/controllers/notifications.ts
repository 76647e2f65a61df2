import { NotificationsService } from '../services/notifications.js';
import { createItemsRouter } from './items.js';
import { createNotificationSchema, updateNotificationSchema } from './schemas/notifications.schema.js';

export default createItemsRouter({
	service: () => new NotificationsService(),
	createSchema: createNotificationSchema,
	updateSchema: updateNotificationSchema,
});
