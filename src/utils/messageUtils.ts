/**
 * Message Utilities - Status Message Rendering
 *
 * @description
 * Glue between the platform-neutral status reporter and Discord messages:
 * report actions become a row of buttons, and a sent message becomes the
 * editor the reporter drives.
 *
 * @module utils/messageUtils
 */

import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import { MessageEditor, ReportAction } from '../services/statusReporter';

// Discord rejects custom ids longer than this
const MAX_CUSTOM_ID_LENGTH = 100;

/**
 * Builds the component rows for a message; no actions means no rows, which
 * also clears buttons left from an earlier edit
 */
export function buildActionRows(actions: ReportAction[]): ActionRowBuilder<ButtonBuilder>[] {
	const buttons = actions
		.filter(action => action.id.length <= MAX_CUSTOM_ID_LENGTH)
		.slice(0, 5)
		.map(action => new ButtonBuilder()
			.setCustomId(action.id)
			.setLabel(action.label)
			.setStyle(ButtonStyle.Secondary));

	return buttons.length > 0 ? [new ActionRowBuilder<ButtonBuilder>().addComponents(buttons)] : [];
}

/**
 * Message fields the editor needs
 */
export interface EditableMessage {
	edit(options: { content: string; components: ActionRowBuilder<ButtonBuilder>[] }): Promise<unknown>;
}

export function createMessageEditor(message: EditableMessage): MessageEditor {
	return async (text, actions) => {
		await message.edit({ content: text, components: buildActionRows(actions) });
	};
}

const messageUtils = {
	buildActionRows,
	createMessageEditor,
};

export default messageUtils;
