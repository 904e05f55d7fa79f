/**
 * Test Suite: File Handle Construction
 *
 * Tests cover platform file id encoding, media kind detection, display name
 * synthesis and handle building from attachments and stickers.
 */

import { describe, it, expect } from 'vitest';
import { MessageFlags, StickerFormatType } from 'discord.js';
import {
	AttachmentLike,
	buildFileHandles,
	computeFileUniqueId,
	detectMediaKind,
	encodeAttachmentFileId,
	findAttachmentHandle,
	MessageLike,
	parsePlatformFileId,
	StickerLike,
	synthesizeDisplayName,
} from '@utils/fileHandle';
import { MediaKind } from '@/types/transfer';

function createMessage(options: {
	attachments?: AttachmentLike[];
	stickers?: StickerLike[];
	voice?: boolean;
} = {}): MessageLike {
	return {
		id: '222222222222222222',
		channelId: '111111111111111111',
		flags: { has: (flag: MessageFlags) => options.voice === true && flag === MessageFlags.IsVoiceMessage },
		attachments: new Map((options.attachments ?? []).map(attachment => [attachment.id, attachment])),
		stickers: new Map((options.stickers ?? []).map(sticker => [sticker.id, sticker])),
	};
}

const pdf: AttachmentLike = { id: '333333333333333333', name: 'report.pdf', size: 2048, contentType: 'application/pdf' };

describe('fileHandle', () => {
	describe('platform file ids', () => {
		it('should round-trip attachment locations', () => {
			const id = encodeAttachmentFileId('111', '222', '333');

			expect(id).toBe('111:222:333');
			expect(parsePlatformFileId(id)).toEqual({ type: 'attachment', channelId: '111', messageId: '222', attachmentId: '333' });
		});

		it('should decode sticker ids', () => {
			expect(parsePlatformFileId('sticker:444')).toEqual({ type: 'sticker', stickerId: '444' });
		});

		it.each(['', 'abc', '1:2', 'sticker:wave', '1:2:x', '1:2:3:4'])('should reject malformed id %j', id => {
			expect(parsePlatformFileId(id)).toBeNull();
		});
	});

	describe('computeFileUniqueId', () => {
		it('should be stable for the same name and size', () => {
			expect(computeFileUniqueId('a.txt', 10)).toBe(computeFileUniqueId('a.txt', 10));
			expect(computeFileUniqueId('a.txt', 10)).toMatch(/^[0-9a-f]{16}$/);
		});

		it('should differ when the size differs', () => {
			expect(computeFileUniqueId('a.txt', 10)).not.toBe(computeFileUniqueId('a.txt', 11));
		});
	});

	describe('detectMediaKind', () => {
		it('should map content types to media kinds', () => {
			expect(detectMediaKind('image/png', false)).toBe(MediaKind.Photo);
			expect(detectMediaKind('video/mp4', false)).toBe(MediaKind.Video);
			expect(detectMediaKind('audio/mpeg', false)).toBe(MediaKind.Audio);
			expect(detectMediaKind('application/zip', false)).toBe(MediaKind.Document);
			expect(detectMediaKind(null, false)).toBe(MediaKind.Document);
		});

		it('should ignore parameters and case', () => {
			expect(detectMediaKind('Video/MP4; codecs="avc1"', false)).toBe(MediaKind.Video);
		});

		it('should prefer the voice flag over the content type', () => {
			expect(detectMediaKind('audio/ogg', true)).toBe(MediaKind.Voice);
		});
	});

	describe('synthesizeDisplayName', () => {
		it('should use the kind, a short id and the extension', () => {
			expect(synthesizeDisplayName(MediaKind.Photo, 'a1b2c3d4e5f60718', 'image/jpeg')).toBe('photo_a1b2c3d4.jpeg');
		});

		it('should omit the extension for unknown types', () => {
			expect(synthesizeDisplayName(MediaKind.Document, 'a1b2c3d4e5f60718', null)).toBe('document_a1b2c3d4');
		});
	});

	describe('buildFileHandles', () => {
		it('should build one handle per attachment', () => {
			const [handle] = buildFileHandles(createMessage({ attachments: [pdf] }));

			expect(handle).toEqual({
				platformFileId: '111111111111111111:222222222222222222:333333333333333333',
				platformFileUniqueId: computeFileUniqueId('report.pdf', 2048),
				displayName: 'report.pdf',
				sizeBytes: 2048,
				mediaKind: MediaKind.Document,
				contentType: 'application/pdf',
			});
		});

		it('should mark voice messages', () => {
			const voice: AttachmentLike = { id: '555555555555555555', name: 'voice-message.ogg', size: 900, contentType: 'audio/ogg' };

			const [handle] = buildFileHandles(createMessage({ attachments: [voice], voice: true }));

			expect(handle.mediaKind).toBe(MediaKind.Voice);
		});

		it('should synthesize a name for unnamed attachments', () => {
			const unnamed: AttachmentLike = { id: '666666666666666666', name: null, size: 10, contentType: 'image/png' };

			const [handle] = buildFileHandles(createMessage({ attachments: [unnamed] }));

			expect(handle.platformFileUniqueId).toBe(computeFileUniqueId('666666666666666666', 10));
			expect(handle.displayName).toBe(`photo_${handle.platformFileUniqueId.slice(0, 8)}.png`);
		});

		it('should build sticker handles with no size', () => {
			const sticker: StickerLike = { id: '777777777777777777', name: 'wave', format: StickerFormatType.PNG };

			const [handle] = buildFileHandles(createMessage({ stickers: [sticker] }));

			expect(handle.platformFileId).toBe('sticker:777777777777777777');
			expect(handle.displayName).toBe('wave.png');
			expect(handle.sizeBytes).toBe(0);
			expect(handle.mediaKind).toBe(MediaKind.Sticker);
			expect(handle.contentType).toBe('image/png');
		});

		it('should name Lottie stickers as JSON', () => {
			const sticker: StickerLike = { id: '888888888888888888', name: 'dance', format: StickerFormatType.Lottie };

			const [handle] = buildFileHandles(createMessage({ stickers: [sticker] }));

			expect(handle.displayName).toBe('dance.json');
		});

		it('should return nothing for a text-only message', () => {
			expect(buildFileHandles(createMessage())).toEqual([]);
		});
	});

	describe('findAttachmentHandle', () => {
		it('should find a single attachment by id', () => {
			const message = createMessage({ attachments: [pdf] });

			expect(findAttachmentHandle(message, '333333333333333333')?.displayName).toBe('report.pdf');
			expect(findAttachmentHandle(message, '999')).toBeNull();
		});
	});
});
