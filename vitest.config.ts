import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		setupFiles: ['source/test-setup.ts'],
		// LanceDB native bindings and the fixture copies make some tests slow
		testTimeout: 60_000,
		hookTimeout: 60_000,
		pool: 'forks',
		fileParallelism: false,
	},
});
