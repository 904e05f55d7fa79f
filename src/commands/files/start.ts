import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { HELP_TEXT } from '../../config/messages';

/**
 * Start Command
 *
 * Greets the user and explains how to send files. Mirrors the welcome text a
 * user sees the first time they open a DM with the bot.
 *
 * @module commands/files/start
 */
export const data = new SlashCommandBuilder()
	.setName('start')
	.setDescription('Shows how to get links for your files.');

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
	await interaction.reply({
		content: `👋 Hi ${interaction.user.username}!\n\n${HELP_TEXT}`,
		ephemeral: true,
	});
}
