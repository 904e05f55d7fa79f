/**
 * Test Suite: Logger Configuration
 *
 * Tests cover environment-based LogMode selection and the output format
 * passed to LogEngine.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

describe('logger configuration', () => {
	let originalEnv: NodeJS.ProcessEnv;

	beforeEach(() => {
		originalEnv = { ...process.env };
		// Fresh modules so isDevelopment is recomputed from NODE_ENV
		vi.resetModules();
	});

	afterEach(() => {
		process.env = originalEnv;
		vi.resetModules();
	});

	it('should configure DEBUG mode in development', async () => {
		process.env.NODE_ENV = 'development';

		await import('@config/logger');
		const { LogEngine, LogMode } = await import('@wgtechlabs/log-engine');

		expect(LogEngine.configure).toHaveBeenCalledWith({
			mode: LogMode.DEBUG,
			format: { includeIsoTimestamp: false, includeLocalTime: true },
		});
	});

	it('should configure INFO mode in production', async () => {
		process.env.NODE_ENV = 'production';

		await import('@config/logger');
		const { LogEngine, LogMode } = await import('@wgtechlabs/log-engine');

		expect(LogEngine.configure).toHaveBeenCalledWith({
			mode: LogMode.INFO,
			format: { includeIsoTimestamp: false, includeLocalTime: true },
		});
	});

	it('should re-export LogEngine and LogMode', async () => {
		const logger = await import('@config/logger');

		expect(typeof logger.LogEngine.info).toBe('function');
		expect(logger.LogMode.DEBUG).toBe('debug');
	});
});
