import type { AbstractServiceOptions, Subscription } from '../types/index.js';
import { ItemsService } from './items.js';

export class SubscriptionsService extends ItemsService<Subscription> {
	constructor(options: AbstractServiceOptions = {}) {
		super('subscriptions', options);
	}
}
