import { SlashCommandBuilder, ChatInputCommandInteraction } from 'discord.js';
import { LogEngine } from '../../config/logger';
import { CLEANUP_DENIED_MESSAGE } from '../../config/messages';
import { BotRuntime } from '../../types/discord';

/**
 * Cleanup Command
 *
 * Removes expired link records from every store now instead of waiting for
 * the periodic sweep, then reports how many live links remain. When ADMIN_USER_IDS is set only those users may run it.
 *
 * @module commands/files/cleanup
 */
export const data = new SlashCommandBuilder()
	.setName('cleanup')
	.setDescription('Removes expired links.');

export function canRunCleanup(userId: string, adminUserIds: string[]): boolean {
	return adminUserIds.length === 0 || adminUserIds.includes(userId);
}

export async function execute(interaction: ChatInputCommandInteraction, runtime: BotRuntime): Promise<void> {
	if (!canRunCleanup(interaction.user.id, runtime.config.ADMIN_USER_IDS)) {
		LogEngine.warn(`User ${interaction.user.id} attempted /cleanup without permission`);
		await interaction.reply({ content: CLEANUP_DENIED_MESSAGE, ephemeral: true });
		return;
	}

	await interaction.deferReply({ ephemeral: true });
	const removed = await runtime.recordStore.sweepExpired();
	const { active } = await runtime.recordStore.stats();
	LogEngine.info(`Cleanup by ${interaction.user.id} removed ${removed} expired records, ${active} remain`);

	await interaction.editReply(`🧹 Removed ${removed} expired link${removed === 1 ? '' : 's'}. ${active} active link${active === 1 ? '' : 's'} remaining.`);
}
