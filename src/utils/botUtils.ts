/**
 * Bot Utility Functions - Core Bot Information Management
 *
 * @description
 * Consistent bot information for embeds and logs: the display name with a
 * fallback hierarchy, and a footer that carries the running version.
 *
 * @module utils/botUtils
 *
 * @example Basic Usage
 * ```typescript
 * const embed = new EmbedBuilder()
 *   .setTitle('Link Statistics')
 *   .setFooter({ text: getBotFooter(interaction.client) });
 * // Footer: "My Relay Bot v1.0.0"
 * ```
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export const DEFAULT_BOT_NAME = 'File Relay';

/**
 * Client fields read when naming the bot
 */
export interface BotIdentity {
	user: { displayName?: string | null; username?: string | null } | null;
}

let cachedVersion: string | undefined;

/**
 * Version from package.json, read once; the same relative path works from
 * both src/utils and dist/utils
 */
export function getBotVersion(): string {
	if (cachedVersion === undefined) {
		try {
			const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../../package.json'), 'utf8'));
			const version = typeof raw === 'object' && raw !== null && 'version' in raw ? raw.version : undefined;
			cachedVersion = typeof version === 'string' ? version : '0.0.0';
		}
		catch {
			cachedVersion = '0.0.0';
		}
	}
	return cachedVersion;
}

/**
 * Retrieves bot display name, falling back to the username and then the default
 */
export function getBotName(client?: BotIdentity | null): string {
	const user = client?.user;

	if (user?.displayName && user.displayName.trim()) {
		return user.displayName;
	}

	if (user?.username && user.username.trim()) {
		return user.username;
	}

	return DEFAULT_BOT_NAME;
}

/**
 * Gets a formatted footer text with bot name and version
 */
export function getBotFooter(client?: BotIdentity | null): string {
	return `${getBotName(client)} v${getBotVersion()}`;
}
