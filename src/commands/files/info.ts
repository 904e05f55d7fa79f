import { SlashCommandBuilder, EmbedBuilder, ChatInputCommandInteraction } from 'discord.js';
import { NOT_FOUND_MESSAGE, renderRecordInfo } from '../../config/messages';
import { BotRuntime } from '../../types/discord';
import { getBotFooter } from '../../utils/botUtils';

/**
 * Info Command - Link Record Lookup
 *
 * @description
 * Looks up the record behind an instant link from its id and hash, the two
 * values printed under every link set. Both must match: an id alone never
 * reveals anything, and wrong, unknown or expired pairs all get the same
 * "not found" reply.
 *
 * @module commands/files/info
 *
 * @example
 * ```typescript
 * // Slash command: /info id:123456 hash:3f2a9c1d
 * ```
 */
export const data = new SlashCommandBuilder()
	.setName('info')
	.setDescription('Shows details of a link you received.')
	.addIntegerOption(option =>
		option.setName('id')
			.setDescription('The link id')
			.setRequired(true)
			.setMinValue(0)
			.setMaxValue(999999))
	.addStringOption(option =>
		option.setName('hash')
			.setDescription('The 8-character link hash')
			.setRequired(true)
			.setMinLength(8)
			.setMaxLength(8));

export async function execute(interaction: ChatInputCommandInteraction, runtime: BotRuntime): Promise<void> {
	const uniqueId = interaction.options.getInteger('id', true);
	const hash = interaction.options.getString('hash', true).trim().toLowerCase();

	const record = await runtime.recordStore.get(uniqueId, hash);
	if (!record) {
		await interaction.reply({ content: NOT_FOUND_MESSAGE, ephemeral: true });
		return;
	}

	const embed = new EmbedBuilder()
		.setColor(0xEB1A1A)
		.setDescription(renderRecordInfo(record))
		.setFooter({ text: getBotFooter(interaction.client) });

	await interaction.reply({ embeds: [embed], ephemeral: true });
}
