/**
 * File Relay Discord Bot - Main Entry Point
 *
 * Starts the Discord client that receives files over DM and the HTTP server
 * that answers the instant links it hands out.
 *
 * 🏗️ ARCHITECTURE OVERVIEW FOR CONTRIBUTORS:
 * ==========================================
 * 1. Discord Client: receives DMs, slash commands and backup buttons
 * 2. Upload Orchestrator: instant links first, GoFile upload as the fallback
 * 3. Record Store: PostgreSQL with an in-memory fallback (memory only when
 *    POSTGRES_URL is unset)
 * 4. Link Server: express app redirecting /dl links to fresh Discord URLs
 *
 * Data Flow:
 * Discord DM → FileHandle → Orchestrator → (LinkGenerator | TransferClient) → reply
 *
 * 🔧 DEVELOPMENT SETUP:
 * =====================
 * 1. Copy .env.example to .env and fill required variables
 * 2. Run `npm install`
 * 3. Run `npm run build && npm start`
 * 4. Use `npm run deploycommand` to register slash commands ahead of time
 *
 * 🐛 TROUBLESHOOTING:
 * ==================
 * - Bot not responding to DMs? Enable the Message Content intent in the portal
 * - Links 502? The original Discord message was deleted
 * - Links point at localhost? Set LINK_BASE_URL to the public address
 *
 * Environment Variables Required:
 * - DISCORD_BOT_TOKEN: Bot token from Discord Developer Portal
 * - CLIENT_ID: Application ID (command deployment)
 * - LINK_BASE_URL, PORT, POSTGRES_URL, GUILD_ID, ADMIN_USER_IDS: optional
 *
 * @module index
 */

// Load environment variables first, before any other imports
import * as dotenv from 'dotenv';
dotenv.config();

import type { Server } from 'node:http';
import { Client, GatewayIntentBits, Partials } from 'discord.js';
import { getAllConfig } from './config/defaults';
import { LogEngine } from './config/logger';
import * as errorEvent from './events/error';
import * as interactionCreate from './events/interactionCreate';
import * as messageCreate from './events/messageCreate';
import * as ready from './events/ready';
import { createRecordStores, createRuntime, RecordStores } from './runtime';
import { createLinkServer, listenLinkServer } from './services/linkServer';

/**
 * Discord Client Configuration
 *
 * - DirectMessages + MessageContent: files arrive as DMs
 * - Guilds: required for slash command interactions
 * - Channel partial: DM channels are not cached before the first message
 */
const client = new Client({
	intents: [
		GatewayIntentBits.Guilds,
		GatewayIntentBits.DirectMessages,
		GatewayIntentBits.MessageContent,
	],
	partials: [
		Partials.Channel,
		Partials.Message,
	],
});

let httpServer: Server | null = null;
let stores: RecordStores | null = null;

async function main(): Promise<void> {
	const { DISCORD_BOT_TOKEN } = process.env;
	if (!DISCORD_BOT_TOKEN) {
		LogEngine.error('DISCORD_BOT_TOKEN is required but not set in environment variables');
		process.exit(1);
	}

	const config = getAllConfig();
	stores = await createRecordStores(config);
	const runtime = createRuntime(client, config, stores);

	client.once(ready.name, bot => {
		ready.execute(bot).catch((error: unknown) => LogEngine.error('Ready handler failed:', error));
	});
	client.on(messageCreate.name, message => {
		messageCreate.execute(message, runtime).catch((error: unknown) => LogEngine.error('Message handler failed:', error));
	});
	client.on(interactionCreate.name, interaction => {
		interactionCreate.execute(interaction, runtime).catch((error: unknown) => LogEngine.error('Interaction handler failed:', error));
	});
	client.on(errorEvent.name, errorEvent.execute);

	const app = createLinkServer({ recordStore: runtime.recordStore, platform: runtime.platform });
	httpServer = listenLinkServer(app, config.PORT, () => {
		LogEngine.error(`Link server unavailable, links under ${config.LINK_BASE_URL} cannot be served. Exiting.`);
		stores?.memoryStore.stopSweeper();
		process.exit(1);
	});

	await client.login(DISCORD_BOT_TOKEN);
	LogEngine.info('🚀 File Relay bot started successfully');
}

async function shutdown(signal: string): Promise<void> {
	LogEngine.info(`Received ${signal}, shutting down...`);

	httpServer?.close();
	stores?.memoryStore.stopSweeper();
	await client.destroy();
	if (stores?.pool) {
		await stores.pool.end();
	}

	process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
	process.once(signal, () => {
		shutdown(signal).catch((error: unknown) => {
			LogEngine.error('Shutdown failed:', error);
			process.exit(1);
		});
	});
}

main().catch((error: unknown) => {
	LogEngine.error('Failed to start bot:', error);
	process.exit(1);
});
