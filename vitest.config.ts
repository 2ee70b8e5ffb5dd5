import {defineConfig} from 'vitest/config';

export default defineConfig({
	esbuild: {
		jsx: 'automatic',
	},
	test: {
		include: ['tests/**/*.test.{ts,tsx}'],
		environment: 'node',
		testTimeout: 20_000,
		// Ink renders differently when it detects a CI environment; keep test runs deterministic.
		env: {CI: 'false'},
	},
});
