import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/src/**/*.test.ts', 'targets/*/src/**/*.test.ts'],
		environment: 'node',
		env: {
			TZ: 'UTC',
		},
		testTimeout: 10_000,
	},
});
