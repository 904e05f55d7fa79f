/**
 * Interaction Create Event Handler
 *
 * This module handles all Discord interactions for the bot:
 * - Slash command executions, routed through the command registry
 * - "Back up to GoFile" buttons attached to instant-link replies
 *
 * @module events/interactionCreate
 */

import { ButtonInteraction, ChatInputCommandInteraction, Events, Interaction } from 'discord.js';
import { findCommand } from '../commands';
import { LogEngine } from '../config/logger';
import { BACKUP_ACTION_PREFIX, COMMAND_ERROR_MESSAGE, FILE_GONE_MESSAGE, renderStatus } from '../config/messages';
import { ThrottledStatusReporter } from '../services/statusReporter';
import { BotRuntime } from '../types/discord';
import { createMessageEditor } from '../utils/messageUtils';

export const name = Events.InteractionCreate;

export async function execute(interaction: Interaction, runtime: BotRuntime): Promise<void> {
	// ===== COMMAND HANDLING =====
	if (interaction.isChatInputCommand()) {
		await handleCommand(interaction, runtime);
		return;
	}

	// ===== BACKUP BUTTON HANDLING =====
	if (interaction.isButton() && interaction.customId.startsWith(BACKUP_ACTION_PREFIX)) {
		await handleBackup(interaction, runtime);
	}
}

async function handleCommand(interaction: ChatInputCommandInteraction, runtime: BotRuntime): Promise<void> {
	const command = findCommand(interaction.commandName);
	if (!command) {
		LogEngine.error(`No command matching ${interaction.commandName} was found.`);
		return;
	}

	try {
		await command.execute(interaction, runtime);
	}
	catch (error) {
		LogEngine.error(`Command /${interaction.commandName} failed:`, error);
		if (interaction.replied || interaction.deferred) {
			await interaction.followUp({ content: COMMAND_ERROR_MESSAGE, ephemeral: true });
		}
		else {
			await interaction.reply({ content: COMMAND_ERROR_MESSAGE, ephemeral: true });
		}
	}
}

/**
 * Re-runs a file that already has instant links through the hosting upload
 */
async function handleBackup(interaction: ButtonInteraction, runtime: BotRuntime): Promise<void> {
	const platformFileId = interaction.customId.slice(BACKUP_ACTION_PREFIX.length);
	const handle = await runtime.platform.findHandle(platformFileId);

	if (!handle) {
		await interaction.reply({ content: FILE_GONE_MESSAGE, ephemeral: true });
		return;
	}

	LogEngine.info(`Backup of ${handle.displayName} requested by ${interaction.user.id}`);

	// Only one backup per link set
	await interaction.message.edit({ components: [] }).catch((error: unknown) => {
		LogEngine.debug('Could not remove backup button:', error instanceof Error ? error.message : String(error));
	});

	const statusMessage = await interaction.reply({
		content: renderStatus(handle, '📦 Backup requested'),
		fetchReply: true,
	});
	const reporter = new ThrottledStatusReporter(createMessageEditor(statusMessage), {
		minIntervalMs: runtime.config.STATUS_UPDATE_INTERVAL_MS,
	});

	await runtime.orchestrator.backup(handle, reporter);
}
