/**
 * File Handle Construction
 *
 * Turns the files carried by an inbound Discord message into immutable
 * FileHandles. The media kind is decided here, once, from the attachment's
 * content type and the message's voice flag; nothing downstream inspects the
 * message shape again.
 *
 * Platform file ids encode where the file can be found again:
 * - attachments: `<channelId>:<messageId>:<attachmentId>`
 * - stickers:    `sticker:<stickerId>`
 *
 * @module utils/fileHandle
 */

import { createHash } from 'node:crypto';
import * as mime from 'mime-types';
import { MessageFlags, StickerFormatType } from 'discord.js';
import { FileHandle, MediaKind } from '../types/transfer';

/**
 * Attachment fields the handle builder reads
 */
export interface AttachmentLike {
	id: string;
	name: string | null;
	size: number;
	contentType: string | null;
}

/**
 * Sticker fields the handle builder reads
 */
export interface StickerLike {
	id: string;
	name: string;
	format: StickerFormatType;
}

/**
 * Message fields the handle builder reads
 */
export interface MessageLike {
	id: string;
	channelId: string;
	flags: { has(flag: MessageFlags): boolean };
	attachments: { values(): Iterable<AttachmentLike> };
	stickers: { values(): Iterable<StickerLike> };
}

/**
 * Decoded form of a platform file id
 */
export type PlatformFileLocator =
	| { type: 'attachment'; channelId: string; messageId: string; attachmentId: string }
	| { type: 'sticker'; stickerId: string };

const SNOWFLAKE = /^\d{1,20}$/;

export function encodeAttachmentFileId(channelId: string, messageId: string, attachmentId: string): string {
	return `${channelId}:${messageId}:${attachmentId}`;
}

export function encodeStickerFileId(stickerId: string): string {
	return `sticker:${stickerId}`;
}

/**
 * Decodes a platform file id, returning null for anything malformed
 */
export function parsePlatformFileId(platformFileId: string): PlatformFileLocator | null {
	const parts = platformFileId.split(':');

	if (parts.length === 2 && parts[0] === 'sticker' && SNOWFLAKE.test(parts[1])) {
		return { type: 'sticker', stickerId: parts[1] };
	}

	if (parts.length === 3 && parts.every(part => SNOWFLAKE.test(part))) {
		const [channelId, messageId, attachmentId] = parts;
		return { type: 'attachment', channelId, messageId, attachmentId };
	}

	return null;
}

/**
 * Digest of name and size, identical for re-sends of the same file
 */
export function computeFileUniqueId(name: string, sizeBytes: number): string {
	return createHash('sha256').update(`${name}:${sizeBytes}`).digest('hex').slice(0, 16);
}

export function detectMediaKind(contentType: string | null, isVoiceMessage: boolean): MediaKind {
	if (isVoiceMessage) {
		return MediaKind.Voice;
	}

	const baseType = (contentType ?? '').split(';')[0].trim().toLowerCase();
	if (baseType.startsWith('image/')) {
		return MediaKind.Photo;
	}
	if (baseType.startsWith('video/')) {
		return MediaKind.Video;
	}
	if (baseType.startsWith('audio/')) {
		return MediaKind.Audio;
	}
	return MediaKind.Document;
}

/**
 * Builds a name for files that arrive without one, e.g. `photo_3f2a9c1d.jpeg`
 */
export function synthesizeDisplayName(kind: MediaKind, uniqueId: string, contentType: string | null): string {
	const extension = contentType ? mime.extension(contentType) : false;
	const stem = `${kind}_${uniqueId.slice(0, 8)}`;
	return extension ? `${stem}.${extension}` : stem;
}

function stickerExtension(format: StickerFormatType): string {
	switch (format) {
	case StickerFormatType.Lottie:
		return 'json';
	case StickerFormatType.GIF:
		return 'gif';
	default:
		return 'png';
	}
}

export function fileHandleFromAttachment(message: MessageLike, attachment: AttachmentLike): FileHandle {
	const isVoice = message.flags.has(MessageFlags.IsVoiceMessage);
	const mediaKind = detectMediaKind(attachment.contentType, isVoice);
	const rawName = attachment.name?.trim() ?? '';
	const platformFileUniqueId = computeFileUniqueId(rawName || attachment.id, attachment.size);

	return {
		platformFileId: encodeAttachmentFileId(message.channelId, message.id, attachment.id),
		platformFileUniqueId,
		displayName: rawName || synthesizeDisplayName(mediaKind, platformFileUniqueId, attachment.contentType),
		sizeBytes: attachment.size,
		mediaKind,
		contentType: attachment.contentType ?? undefined,
	};
}

export function fileHandleFromSticker(sticker: StickerLike): FileHandle {
	const extension = stickerExtension(sticker.format);
	const name = sticker.name.trim() || `sticker_${sticker.id}`;

	return {
		platformFileId: encodeStickerFileId(sticker.id),
		platformFileUniqueId: computeFileUniqueId(`sticker:${sticker.id}`, 0),
		displayName: `${name}.${extension}`,
		// Discord does not report sticker sizes
		sizeBytes: 0,
		mediaKind: MediaKind.Sticker,
		contentType: mime.lookup(extension) || undefined,
	};
}

/**
 * Collects one handle per attachment and sticker on a message
 */
export function buildFileHandles(message: MessageLike): FileHandle[] {
	const handles: FileHandle[] = [];

	for (const attachment of message.attachments.values()) {
		handles.push(fileHandleFromAttachment(message, attachment));
	}
	for (const sticker of message.stickers.values()) {
		handles.push(fileHandleFromSticker(sticker));
	}

	return handles;
}

/**
 * Finds the handle for one attachment id on a message, for re-entry from a button
 */
export function findAttachmentHandle(message: MessageLike, attachmentId: string): FileHandle | null {
	for (const attachment of message.attachments.values()) {
		if (attachment.id === attachmentId) {
			return fileHandleFromAttachment(message, attachment);
		}
	}
	return null;
}
