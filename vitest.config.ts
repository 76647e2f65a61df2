import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts'],
		environment: 'node',
		env: {
			LOG_LEVEL: 'silent',
			CONFIG_PATH: '.env.test',
			SCF_WEBHOOK_SECRET: 'test-secret',
			NOTIFIER_CONTAINER_NAME: 'notifier',
			ACS_SENDER_CONTAINER_NAME: 'acs-sender',
			STORAGE_DRIVER: 'local',
		},
	},
});
