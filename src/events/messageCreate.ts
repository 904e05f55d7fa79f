/**
 * Message Create Event Handler - File Intake
 *
 * @description
 * Entry point of the relay. Every direct message carrying files is split into
 * one FileHandle per attachment or sticker, and each handle runs through the
 * upload pipeline behind its own status message. Guild messages and messages
 * from bots are ignored.
 *
 * @module events/messageCreate
 */

import { ChannelType, Events, Message } from 'discord.js';
import { LogEngine } from '../config/logger';
import { renderStatus, UNSUPPORTED_MESSAGE } from '../config/messages';
import { ThrottledStatusReporter } from '../services/statusReporter';
import { FileHandle } from '../types/transfer';
import { BotRuntime } from '../types/discord';
import { buildFileHandles } from '../utils/fileHandle';
import { createMessageEditor } from '../utils/messageUtils';

export const name = Events.MessageCreate;
export const once = false;

/**
 * Processes one inbound message
 */
export async function execute(message: Message, runtime: BotRuntime): Promise<void> {
	if (message.author.bot || message.channel.type !== ChannelType.DM) {
		return;
	}

	const handles = buildFileHandles(message);
	if (handles.length === 0) {
		LogEngine.debug(`DM from ${message.author.id} without files`);
		await message.reply(UNSUPPORTED_MESSAGE);
		return;
	}

	LogEngine.info(`Received ${handles.length} file(s) from ${message.author.id}`);

	// One at a time so status messages stay in order
	for (const handle of handles) {
		await relayFile(message, handle, runtime);
	}
}

async function relayFile(message: Message, handle: FileHandle, runtime: BotRuntime): Promise<void> {
	const statusMessage = await message.reply(renderStatus(handle, '📥 Received'));
	const reporter = new ThrottledStatusReporter(createMessageEditor(statusMessage), {
		minIntervalMs: runtime.config.STATUS_UPDATE_INTERVAL_MS,
	});

	await runtime.orchestrator.run(handle, reporter);
}
