/**
 * Test Suite: Error Event Handler
 */

import { describe, it, expect } from 'vitest';
import { Events } from 'discord.js';
import { LogEngine } from '@config/logger';
import { name, execute, once } from '@events/error';

describe('Error Event Handler', () => {
	it('should listen for client errors on every occurrence', () => {
		expect(name).toBe(Events.Error);
		expect(once).toBe(false);
	});

	it('should log the stack trace when there is one', () => {
		const error = new Error('Gateway closed');
		error.stack = 'Error: Gateway closed\n    at gateway.ts:1:1';

		execute(error);

		expect(LogEngine.error).toHaveBeenCalledWith('Discord.js Client Error: Error: Gateway closed\n    at gateway.ts:1:1');
	});

	it('should fall back to the message', () => {
		const error = new Error('Gateway closed');
		error.stack = undefined;

		execute(error);

		expect(LogEngine.error).toHaveBeenCalledWith('Discord.js Client Error: Gateway closed');
	});
});
