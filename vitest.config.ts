import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['tests/**/*.test.ts'],
		exclude: ['node_modules', 'dist'],
		// better-sqlite3 and sqlite-vec are native; keep them out of worker threads
		pool: 'forks',
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});
