/**
 * Discord Slash Commands Deployment Script
 *
 * Registers the command registry with Discord without starting the bot.
 * Commands go to GUILD_ID when it is set and to the global scope otherwise.
 *
 * Usage:
 *   npm run deploycommand
 *
 * Environment Variables Required:
 *   - DISCORD_BOT_TOKEN: Bot token from Discord Developer Portal
 *   - CLIENT_ID: Application ID from Discord Developer Portal
 *   - GUILD_ID: Discord server ID for guild-scoped deployment (optional)
 *
 * @module deploy_commands
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { commands } from './commands';
import { LogEngine } from './config/logger';
import { deployCommandsIfNeeded } from './utils/commandDeployment';

async function main(): Promise<void> {
	const { DISCORD_BOT_TOKEN, CLIENT_ID, GUILD_ID } = process.env;

	if (!DISCORD_BOT_TOKEN) {
		LogEngine.error('DISCORD_BOT_TOKEN is required but not set in environment variables');
		process.exit(1);
	}

	if (!CLIENT_ID) {
		LogEngine.error('CLIENT_ID is required but not set in environment variables');
		process.exit(1);
	}

	LogEngine.info(`Started refreshing ${commands.length} application (/) commands.`);
	const deployed = await deployCommandsIfNeeded(
		commands.map(command => command.data.toJSON()),
		{ token: DISCORD_BOT_TOKEN, clientId: CLIENT_ID, guildId: GUILD_ID || undefined },
	);
	LogEngine.info(deployed ? 'Commands deployed.' : 'Nothing to deploy.');
}

main().catch((error: unknown) => {
	LogEngine.error('Command deployment failed:', error);
	process.exit(1);
});
