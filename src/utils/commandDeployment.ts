/**
 * Smart Command Deployment Utility
 *
 * Registers the bot's slash commands with Discord only when they differ from
 * what Discord already has:
 * - Fetches the registered commands
 * - Compares them with the local definitions
 * - Puts the full local set when anything was added, modified or removed
 *
 * Commands go to one guild when a guild id is configured (instant updates
 * while developing) and to the global scope otherwise.
 *
 * @module utils/commandDeployment
 */

import { REST, Routes } from 'discord.js';
import { LogEngine } from '../config/logger';

/**
 * Command comparison result
 */
export interface CommandComparison {
	needsUpdate: boolean;
	added: string[];
	modified: string[];
	removed: string[];
	unchanged: string[];
}

export interface DeploymentTarget {
	token: string;
	clientId: string;
	guildId?: string;
}

/**
 * REST calls used by the deployment; satisfied by discord.js REST
 */
export interface CommandRestClient {
	get(route: `/${string}`): Promise<unknown>;
	put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

// Command JSON as built locally or returned by Discord
type CommandPayload = object;

function isPayloadArray(value: unknown): value is CommandPayload[] {
	return Array.isArray(value) && value.every(item => typeof item === 'object' && item !== null && !Array.isArray(item));
}

function commandName(command: CommandPayload): string {
	return 'name' in command && typeof command.name === 'string' ? command.name : '';
}

/**
 * Normalize command payload by removing Discord metadata fields
 *
 * Discord adds ids and version stamps that change on every deployment; only
 * developer-controlled fields take part in the comparison.
 */
export function normalizeCommand(command: CommandPayload): string {
	const normalized: Record<string, unknown> = { ...command };

	delete normalized.id;
	delete normalized.application_id;
	delete normalized.version;
	delete normalized.guild_id;

	return JSON.stringify(normalized);
}

/**
 * Compare local commands with Discord registered commands
 */
export function compareCommands(localCommands: CommandPayload[], discordCommands: CommandPayload[]): CommandComparison {
	const result: CommandComparison = {
		needsUpdate: false,
		added: [],
		modified: [],
		removed: [],
		unchanged: [],
	};

	const localMap = new Map(localCommands.map(cmd => [commandName(cmd), normalizeCommand(cmd)]));
	const discordMap = new Map(discordCommands.map(cmd => [commandName(cmd), normalizeCommand(cmd)]));

	for (const [name, localJson] of localMap) {
		if (!discordMap.has(name)) {
			result.added.push(name);
			result.needsUpdate = true;
		}
		else if (discordMap.get(name) !== localJson) {
			result.modified.push(name);
			result.needsUpdate = true;
		}
		else {
			result.unchanged.push(name);
		}
	}

	for (const [name] of discordMap) {
		if (!localMap.has(name)) {
			result.removed.push(name);
			result.needsUpdate = true;
		}
	}

	return result;
}

export function commandsRoute(target: DeploymentTarget): `/${string}` {
	return target.guildId
		? Routes.applicationGuildCommands(target.clientId, target.guildId)
		: Routes.applicationCommands(target.clientId);
}

/**
 * Deploy commands only if needed
 *
 * @returns true if commands were deployed, false if skipped
 */
export async function deployCommandsIfNeeded(
	localCommands: CommandPayload[],
	target: DeploymentTarget,
	rest: CommandRestClient = new REST().setToken(target.token),
): Promise<boolean> {
	try {
		if (localCommands.length === 0) {
			LogEngine.warn('No local commands found to deploy');
			return false;
		}

		const route = commandsRoute(target);
		const scope = target.guildId ? `guild ${target.guildId}` : 'global scope';
		LogEngine.info(`Checking if command deployment to ${scope} is needed...`);

		const existing = await rest.get(route);
		const existingCommands = isPayloadArray(existing) ? existing : [];
		const comparison = compareCommands(localCommands, existingCommands);

		if (!comparison.needsUpdate) {
			LogEngine.info(`Commands are up-to-date (${comparison.unchanged.length} commands unchanged) - skipping deployment`);
			return false;
		}

		const changes: string[] = [];
		if (comparison.added.length > 0) changes.push(`${comparison.added.length} added (${comparison.added.join(', ')})`);
		if (comparison.modified.length > 0) changes.push(`${comparison.modified.length} modified (${comparison.modified.join(', ')})`);
		if (comparison.removed.length > 0) changes.push(`${comparison.removed.length} removed (${comparison.removed.join(', ')})`);
		LogEngine.info(`Command changes detected: ${changes.join(', ')}`);

		const deployed = await rest.put(route, { body: localCommands });
		const count = Array.isArray(deployed) ? deployed.length : localCommands.length;
		LogEngine.info(`Successfully deployed ${count} slash commands to Discord API`);
		return true;
	}
	catch (error) {
		LogEngine.error('Failed to deploy commands to Discord:', error);
		// Rethrow so retry logic can handle it
		throw error;
	}
}
