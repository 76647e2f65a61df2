export * from './alma.js';
export * from './checks.js';
export * from './items.js';
export * from './notifications.js';
export * from './services.js';
export * from './users.js';
