import { SlashCommandBuilder, EmbedBuilder, ChatInputCommandInteraction } from 'discord.js';
import { HELP_TEXT } from '../../config/messages';
import { getBotFooter } from '../../utils/botUtils';

/**
 * Help Command
 *
 * Summarises what the bot does with files and which commands it accepts.
 *
 * @module commands/files/help
 */
export const data = new SlashCommandBuilder()
	.setName('help')
	.setDescription('Lists what the bot can do.');

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
	const embed = new EmbedBuilder()
		.setColor(0xEB1A1A)
		.setTitle('File Relay Help')
		.setDescription(HELP_TEXT)
		.setFooter({ text: getBotFooter(interaction.client) })
		.setTimestamp();

	await interaction.reply({ embeds: [embed], ephemeral: true });
}
