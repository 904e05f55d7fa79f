/**
 * Discord Platform Adapter
 *
 * Answers the two questions the pipeline asks of the chat platform: where a
 * file can be fetched from right now, and what its bytes are. Discord CDN
 * URLs are signed and expire, so every resolution re-fetches the message
 * (or sticker) and reads a fresh URL from it.
 *
 * @module services/discordPlatform
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ReadableStream } from 'node:stream/web';
import type { Client } from 'discord.js';
import { LogEngine } from '../config/logger';
import { ResolutionError } from '../types/errors';
import { FileHandle } from '../types/transfer';
import { fileHandleFromSticker, findAttachmentHandle, parsePlatformFileId } from '../utils/fileHandle';
import { computeUploadTimeout, removeLocalFile } from './transferClient';

/**
 * Platform operations the orchestrator and link server depend on
 */
export interface ChatPlatform {
	/** Fresh fetchable URL for a file, or null when the platform cannot produce one */
	resolveServerPath(platformFileId: string): Promise<string | null>;
	/** Downloads a file to a temporary path owned by the caller */
	downloadBytes(handle: FileHandle): Promise<string>;
	/** Rebuilds the handle for a file seen earlier, or null when it is gone */
	findHandle(platformFileId: string): Promise<FileHandle | null>;
}

export interface DiscordPlatformOptions {
	downloadDir?: string;
}

/**
 * Keeps temp file names to characters every filesystem accepts
 */
export function tempFileName(handle: FileHandle): string {
	const safeName = handle.displayName.replace(/[^\w.-]+/g, '_').slice(-100) || 'file';
	return `${handle.platformFileUniqueId}_${randomUUID().slice(0, 8)}_${safeName}`;
}

export class DiscordPlatform implements ChatPlatform {
	private readonly downloadDir: string;

	constructor(private readonly client: Client, options: DiscordPlatformOptions = {}) {
		this.downloadDir = options.downloadDir ?? path.join(os.tmpdir(), 'file-relay');
	}

	async resolveServerPath(platformFileId: string): Promise<string | null> {
		const locator = parsePlatformFileId(platformFileId);
		if (!locator) {
			LogEngine.warn(`Malformed platform file id: ${platformFileId}`);
			return null;
		}

		if (locator.type === 'sticker') {
			const sticker = await this.client.fetchSticker(locator.stickerId);
			return sticker.url;
		}

		const channel = await this.client.channels.fetch(locator.channelId);
		if (!channel || !channel.isTextBased()) {
			LogEngine.debug(`Channel ${locator.channelId} is gone or has no messages`);
			return null;
		}

		const message = await channel.messages.fetch(locator.messageId);
		const attachment = message.attachments.get(locator.attachmentId);
		if (!attachment) {
			LogEngine.debug(`Attachment ${locator.attachmentId} no longer on message ${locator.messageId}`);
			return null;
		}

		return attachment.url;
	}

	async findHandle(platformFileId: string): Promise<FileHandle | null> {
		const locator = parsePlatformFileId(platformFileId);
		if (!locator) {
			return null;
		}

		try {
			if (locator.type === 'sticker') {
				return fileHandleFromSticker(await this.client.fetchSticker(locator.stickerId));
			}

			const channel = await this.client.channels.fetch(locator.channelId);
			if (!channel || !channel.isTextBased()) {
				return null;
			}
			const message = await channel.messages.fetch(locator.messageId);
			return findAttachmentHandle(message, locator.attachmentId);
		}
		catch (error) {
			LogEngine.warn(`Could not rebuild handle for ${platformFileId}:`, error instanceof Error ? error.message : String(error));
			return null;
		}
	}

	/**
	 * Streams the file to disk; a partial file is removed before the error propagates
	 */
	async downloadBytes(handle: FileHandle): Promise<string> {
		const url = await this.resolveServerPath(handle.platformFileId);
		if (!url) {
			throw new ResolutionError(`No download URL for ${handle.platformFileId}`);
		}

		await fs.mkdir(this.downloadDir, { recursive: true });
		const localPath = path.join(this.downloadDir, tempFileName(handle));

		const timeoutMs = computeUploadTimeout(handle.sizeBytes);
		const abortController = new AbortController();
		const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

		try {
			LogEngine.debug(`Downloading ${handle.displayName} to ${localPath}`);
			const response = await fetch(url, {
				method: 'GET',
				signal: abortController.signal,
			});

			if (!response.ok || !response.body) {
				throw new Error(`HTTP ${response.status}: ${response.statusText}`);
			}

			const bytesWritten = await writeBody(response.body, localPath);
			LogEngine.info(`Downloaded ${handle.displayName}: ${bytesWritten} bytes`);
			return localPath;
		}
		catch (error) {
			await removeLocalFile(localPath);
			throw error;
		}
		finally {
			clearTimeout(timeoutId);
		}
	}
}

async function writeBody(body: ReadableStream<Uint8Array>, localPath: string): Promise<number> {
	const file = await fs.open(localPath, 'w');
	const reader = body.getReader();
	let total = 0;

	try {
		for (;;) {
			const { done, value } = await reader.read();
			if (done) {
				break;
			}
			await file.write(value);
			total += value.byteLength;
		}
		return total;
	}
	finally {
		reader.releaseLock();
		await file.close();
	}
}
