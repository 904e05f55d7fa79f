/**
 * Test Suite: Command Deployment Utilities
 *
 * Tests cover the comparison logic, route selection and the
 * deploy-only-when-changed behaviour against a fake REST client.
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { Routes } from 'discord.js';
import { LogEngine } from '@wgtechlabs/log-engine';
import {
	commandsRoute,
	compareCommands,
	deployCommandsIfNeeded,
	normalizeCommand,
} from '@utils/commandDeployment';

const target = { token: 'test-token', clientId: '100000000000000001' };

interface FakeRest {
	get: Mock;
	put: Mock;
}

function createRest(existing: unknown): FakeRest {
	return {
		get: vi.fn().mockResolvedValue(existing),
		put: vi.fn(async (_route: string, options: { body: unknown }) => options.body),
	};
}

describe('commandDeployment', () => {
	describe('normalizeCommand', () => {
		it('should ignore Discord-generated metadata', () => {
			const local = { name: 'info', description: 'Shows details' };
			const remote = { id: '1', application_id: '2', version: '3', guild_id: '4', name: 'info', description: 'Shows details' };

			expect(normalizeCommand(remote)).toBe(normalizeCommand(local));
		});
	});

	describe('compareCommands', () => {
		it('should classify added, modified, removed and unchanged commands', () => {
			const local = [
				{ name: 'start', description: 'a' },
				{ name: 'help', description: 'new text' },
				{ name: 'stats', description: 'c' },
			];
			const remote = [
				{ id: '1', name: 'help', description: 'old text' },
				{ id: '2', name: 'stats', description: 'c' },
				{ id: '3', name: 'ping', description: 'd' },
			];

			expect(compareCommands(local, remote)).toEqual({
				needsUpdate: true,
				added: ['start'],
				modified: ['help'],
				removed: ['ping'],
				unchanged: ['stats'],
			});
		});

		it('should report no update for identical sets', () => {
			const commands = [{ name: 'help', description: 'a' }];
			expect(compareCommands(commands, commands).needsUpdate).toBe(false);
		});
	});

	describe('commandsRoute', () => {
		it('should use the guild route when a guild id is set', () => {
			expect(commandsRoute({ ...target, guildId: '200000000000000002' }))
				.toBe(Routes.applicationGuildCommands('100000000000000001', '200000000000000002'));
		});

		it('should use the global route otherwise', () => {
			expect(commandsRoute(target)).toBe(Routes.applicationCommands('100000000000000001'));
		});
	});

	describe('deployCommandsIfNeeded', () => {
		it('should skip deployment when commands are unchanged', async () => {
			const rest = createRest([{ id: '9', name: 'help', description: 'a' }]);

			const deployed = await deployCommandsIfNeeded([{ name: 'help', description: 'a' }], target, rest);

			expect(deployed).toBe(false);
			expect(rest.put).not.toHaveBeenCalled();
		});

		it('should put the full local set when something changed', async () => {
			const rest = createRest([]);
			const local = [{ name: 'help', description: 'a' }, { name: 'info', description: 'b' }];

			const deployed = await deployCommandsIfNeeded(local, target, rest);

			expect(deployed).toBe(true);
			expect(rest.put).toHaveBeenCalledWith(Routes.applicationCommands('100000000000000001'), { body: local });
			expect(LogEngine.info).toHaveBeenCalledWith('Successfully deployed 2 slash commands to Discord API');
		});

		it('should treat an unexpected GET payload as no registered commands', async () => {
			const rest = createRest({ message: 'unexpected' });

			await deployCommandsIfNeeded([{ name: 'help' }], target, rest);

			expect(LogEngine.info).toHaveBeenCalledWith('Command changes detected: 1 added (help)');
		});

		it('should not call Discord with an empty local set', async () => {
			const rest = createRest([]);

			expect(await deployCommandsIfNeeded([], target, rest)).toBe(false);
			expect(rest.get).not.toHaveBeenCalled();
		});

		it('should rethrow API failures for the retry wrapper', async () => {
			const rest = createRest([]);
			rest.get.mockRejectedValue(new Error('503 Service Unavailable'));

			await expect(deployCommandsIfNeeded([{ name: 'help' }], target, rest)).rejects.toThrow('503 Service Unavailable');
			expect(LogEngine.error).toHaveBeenCalled();
		});
	});
});
