/**
 * Vitest Configuration
 *
 * Test setup for the file relay bot with TypeScript path mapping and a
 * global setup file that silences the log engine and environment loading.
 *
 * @see https://vitest.dev/config/
 */

import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
	test: {
		// Test environment setup
		globals: true,
		environment: 'node',
		setupFiles: ['./src/__tests__/vitest.setup.ts'],

		// Test file patterns
		include: ['src/**/*.{test,spec}.ts'],
		exclude: [
			'node_modules',
			'dist',
			'coverage',
			'**/*.d.ts',
		],

		coverage: {
			provider: 'v8',
			reporter: ['text', 'json-summary', 'lcov'],
			exclude: [
				'node_modules',
				'dist',
				'coverage',
				'**/*.d.ts',
				'**/*.config.ts',
				'src/__tests__/**',
				// Entry points wire live clients and are not unit tested
				'src/index.ts',
				'src/deploy_commands.ts',
			],
			reportsDirectory: './coverage',
		},

		testTimeout: 10000,
		hookTimeout: 10000,
		isolate: true,
		pool: 'threads',
	},

	// TypeScript path mapping for clean imports
	resolve: {
		alias: {
			'@': resolve(__dirname, './src'),
			'@tests': resolve(__dirname, './src/__tests__'),
			'@utils': resolve(__dirname, './src/utils'),
			'@services': resolve(__dirname, './src/services'),
			'@config': resolve(__dirname, './src/config'),
			'@events': resolve(__dirname, './src/events'),
			'@commands': resolve(__dirname, './src/commands'),
			'@sdk': resolve(__dirname, './src/sdk'),
		},
	},

	esbuild: {
		target: 'node20',
	},
});
