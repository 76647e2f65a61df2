import { UsersService } from '../services/users.js';
import { createItemsRouter } from './items.js';
import { createUserSchema, updateUserSchema } from './schemas/users.schema.js';

export default createItemsRouter({
	service: () => new UsersService(),
	createSchema: createUserSchema,
	updateSchema: updateUserSchema,
});
