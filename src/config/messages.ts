/**
 * User-Facing Messages
 *
 * @description
 * Every text the bot shows to users: the help card, status cards edited
 * while a file moves through the pipeline, and the final outcome replies.
 * Failure texts describe what went wrong in plain words; raw exception
 * messages never reach users except as a short diagnostic for internal
 * errors.
 *
 * @module config/messages
 */

import { FileHandle, LinkSet, TransferErrorKind, TransferRecord, UploadOutcome, InstantLinkKind } from '../types/transfer';
import { formatFileSize } from '../utils/formatSize';

/** Prefix of the action id that re-runs a file through the hosting upload */
export const BACKUP_ACTION_PREFIX = 'backup:';

export const DIAGNOSTIC_MAX_LENGTH = 120;

export const HELP_TEXT = [
	'🚀 **Welcome to File Relay!**',
	'',
	'📁 **How to use:**',
	'• Send me any file, photo, video, audio or sticker in a DM',
	'• I reply with instant download and stream links',
	'• If instant links are not possible, I upload the file to GoFile instead',
	'',
	'🛠️ **Commands:**',
	'• `/info <id> <hash>` - details of a link you received',
	'• `/stats` - stored link statistics',
	'• `/cleanup` - remove expired links',
	'',
	'🔒 **Privacy:** links only work with both the id and its hash, and expire automatically.',
].join('\n');

export const UNSUPPORTED_MESSAGE = [
	'❌ **No file found!**',
	'',
	'📎 Please send a file, photo, video, audio or sticker.',
	'💡 **Tip:** use `/help` to see everything I can do.',
].join('\n');

export const NOT_FOUND_MESSAGE = '❌ No link found for that id and hash. It may have expired.';

export const CLEANUP_DENIED_MESSAGE = '🚫 You are not allowed to run cleanup.';

const TRANSFER_ERROR_TEXT: Record<TransferErrorKind, string> = {
	http: 'GoFile answered with an error status.',
	empty_response: 'GoFile returned an empty response.',
	malformed_response: 'GoFile returned a response I could not read.',
	rejected: 'GoFile rejected the upload.',
	incomplete_result: 'GoFile accepted the upload but did not return a link.',
	timeout: 'The upload to GoFile timed out.',
	connection: 'Could not connect to GoFile.',
};

const LINK_LABELS: Record<InstantLinkKind, string> = {
	download: '⬇️ Download',
	stream: '▶️ Stream',
	direct: '🔗 Direct',
};

function fileHeader(handle: FileHandle): string {
	return `📄 **File:** \`${handle.displayName}\`\n📏 **Size:** \`${formatFileSize(handle.sizeBytes)}\``;
}

/**
 * Status card shown while a file is being processed
 */
export function renderStatus(handle: FileHandle, status: string): string {
	return `${fileHeader(handle)}\n⏳ **Status:** ${status}`;
}

export function truncateDiagnostic(message: string): string {
	const singleLine = message.replace(/\s+/g, ' ').trim();
	return singleLine.length > DIAGNOSTIC_MAX_LENGTH
		? `${singleLine.slice(0, DIAGNOSTIC_MAX_LENGTH - 1)}…`
		: singleLine;
}

export function renderLinkSet(linkSet: LinkSet): string {
	const lines = linkSet.links.map(link => `${LINK_LABELS[link.kind]}: ${link.url}`);
	return [
		...lines,
		'',
		`🆔 **ID:** \`${linkSet.uniqueId}\`  🔑 **Hash:** \`${linkSet.integrityHash}\``,
	].join('\n');
}

/**
 * Final text for a pipeline outcome
 */
export function renderOutcome(handle: FileHandle, outcome: UploadOutcome, maxFileSize: number, elapsedMs: number): string {
	const elapsed = `⚡ Total time: \`${(elapsedMs / 1000).toFixed(1)}s\``;

	switch (outcome.kind) {
	case 'instant_links':
		return `${fileHeader(handle)}\n✅ **Instant links ready!**\n\n${renderLinkSet(outcome.linkSet)}\n\n${elapsed}`;
	case 'hosted_link':
		return `${fileHeader(handle)}\n✅ **Upload Successful!**\n\n🔗 **Download Link:** ${outcome.url}\n\n${elapsed}`;
	case 'failed':
		return `${fileHeader(handle)}\n${renderFailure(outcome, maxFileSize)}`;
	}
}

function renderFailure(outcome: Extract<UploadOutcome, { kind: 'failed' }>, maxFileSize: number): string {
	switch (outcome.reason) {
	case 'too_large':
		return `❌ **File too large!**\n🚫 **Maximum allowed:** \`${formatFileSize(maxFileSize)}\`\n\nPlease send a smaller file.`;
	case 'download_error':
		return '❌ **Status:** Could not download the file from Discord. Please try again.';
	case 'upload_error': {
		const reason = outcome.transferError ? TRANSFER_ERROR_TEXT[outcome.transferError.kind] : 'The upload failed.';
		return `❌ **Status:** Upload Failed\n${reason} Please try again.`;
	}
	case 'internal_error':
		return `❌ **Status:** Something went wrong.${outcome.diagnostic ? `\n🔍 \`${outcome.diagnostic}\`` : ''}`;
	}
}

export function renderRecordInfo(record: TransferRecord): string {
	const ref = record.fileHandleRef;
	return [
		'📋 **Link details**',
		'',
		`📄 **File:** \`${ref.displayName}\``,
		`📏 **Size:** \`${formatFileSize(ref.sizeBytes)}\``,
		`🎞️ **Type:** \`${ref.mediaKind}\``,
		`🕒 **Created:** <t:${Math.floor(record.createdAt.getTime() / 1000)}:f>`,
		`⌛ **Expires:** <t:${Math.floor(record.expiresAt.getTime() / 1000)}:R>`,
	].join('\n');
}

export const FILE_GONE_MESSAGE = '❌ That file is no longer available on Discord, so it cannot be backed up.';

export const COMMAND_ERROR_MESSAGE = '❌ Something went wrong while running that command.';
