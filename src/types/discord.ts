/**
 * Discord Bot Type Definitions
 *
 * Shapes of command modules and of the runtime dependencies handed to
 * event and command handlers.
 *
 * @module types/discord
 */

import type { ChatInputCommandInteraction, SlashCommandBuilder, SlashCommandOptionsOnlyBuilder } from 'discord.js';
import type { AppConfig } from '../config/defaults';
import type { RecordStore } from '../sdk/record-store';
import type { MemoryRecordStore } from '../sdk/record-store/MemoryRecordStore';
import type { UploadOrchestrator } from '../services/uploadOrchestrator';
import type { ChatPlatform } from '../services/discordPlatform';

/**
 * Dependencies assembled once by the composition root
 */
export interface BotRuntime {
	config: AppConfig;
	orchestrator: UploadOrchestrator;
	platform: ChatPlatform;
	/** Store used by the pipeline and lookups */
	recordStore: RecordStore;
	/** In-process fallback map, reported by /stats */
	memoryStore: MemoryRecordStore;
}

/**
 * Slash command module structure
 */
export interface CommandModule {
	data: SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;
	execute: (interaction: ChatInputCommandInteraction, runtime: BotRuntime) => Promise<void>;
}
