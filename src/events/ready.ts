/**
 * Client Ready Event Handler - Bot Initialization
 *
 * @description
 * Runs once when the Discord client connects: sets the presence, logs the
 * identity and version, and makes sure the slash commands Discord knows
 * about match the local registry.
 *
 * @module events/ready
 * @since 1.0.0
 *
 * @troubleshooting
 * - Commands missing: check CLIENT_ID; without GUILD_ID, global commands can
 *   take up to an hour to appear
 * - Process exits right after login: command deployment failed three times,
 *   see the preceding log lines for the Discord API error
 */

import { Events, ActivityType, Client } from 'discord.js';
import { commands } from '../commands';
import { LogEngine } from '../config/logger';
import { getBotName, getBotVersion } from '../utils/botUtils';
import { deployCommandsIfNeeded } from '../utils/commandDeployment';
import { withRetry } from '../utils/retry';

export const name = Events.ClientReady;
export const once = true;

export async function execute(bot: Client): Promise<void> {
	bot.user?.setPresence({
		status: 'online',
		activities: [{
			name: 'your files',
			type: ActivityType.Listening,
		}],
	});

	LogEngine.info(`Logged in as ${getBotName(bot)} @ v${getBotVersion()}`);

	const { DISCORD_BOT_TOKEN, CLIENT_ID, GUILD_ID } = process.env;
	if (!DISCORD_BOT_TOKEN || !CLIENT_ID) {
		LogEngine.warn('Skipping command deployment: DISCORD_BOT_TOKEN or CLIENT_ID is not set');
		return;
	}

	// Exponential backoff: 2s, 4s between the three attempts
	try {
		await withRetry(
			async () => {
				await deployCommandsIfNeeded(
					commands.map(command => command.data.toJSON()),
					{ token: DISCORD_BOT_TOKEN, clientId: CLIENT_ID, guildId: GUILD_ID || undefined },
				);
			},
			{
				operationName: 'Discord command deployment',
				exponentialBackoff: true,
				maxAttempts: 3,
				baseDelayMs: 2000,
			},
		);
	}
	catch (deployError) {
		LogEngine.error('Critical failure: Discord command deployment failed after all retry attempts. Bot startup aborted.', deployError);
		process.exit(1);
	}
}
