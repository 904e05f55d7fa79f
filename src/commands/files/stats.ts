import { SlashCommandBuilder, EmbedBuilder, ChatInputCommandInteraction } from 'discord.js';
import { BotRuntime } from '../../types/discord';
import { getBotFooter } from '../../utils/botUtils';
import { formatFileSize } from '../../utils/formatSize';

/**
 * Stats Command
 *
 * Reports how many link records exist, how many are still live, and the
 * total size of the files they point at. When the durable store is in use,
 * the in-memory fallback is broken out so records written during a database
 * outage are visible.
 *
 * @module commands/files/stats
 */
export const data = new SlashCommandBuilder()
	.setName('stats')
	.setDescription('Shows stored link statistics.');

export async function execute(interaction: ChatInputCommandInteraction, runtime: BotRuntime): Promise<void> {
	await interaction.deferReply({ ephemeral: true });

	const stats = await runtime.recordStore.stats();
	const embed = new EmbedBuilder()
		.setColor(0xEB1A1A)
		.setTitle('📊 Link Statistics')
		.addFields(
			{ name: 'Total records', value: `${stats.total}`, inline: true },
			{ name: 'Active links', value: `${stats.active}`, inline: true },
			{ name: 'Total size', value: formatFileSize(stats.totalSizeBytes), inline: true },
		)
		.setFooter({ text: getBotFooter(interaction.client) })
		.setTimestamp();

	if (runtime.recordStore !== runtime.memoryStore) {
		const fallback = await runtime.memoryStore.stats();
		embed.addFields({ name: 'In-memory fallback', value: `${fallback.active} active / ${fallback.total} total (${formatFileSize(fallback.totalSizeBytes)})` });
	}

	await interaction.editReply({ embeds: [embed] });
}
