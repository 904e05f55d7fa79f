/**
 * Error Event Handler - Discord Client Error Logging
 *
 * @description
 * Logs errors emitted by the Discord client (gateway disconnects, rate-limit
 * failures, rejected API calls) so they never surface as unhandled errors
 * that would stop the process.
 *
 * @module events/error
 */

import { Events } from 'discord.js';
import { LogEngine } from '../config/logger';

export const name = Events.Error;
export const once = false;

export function execute(error: Error): void {
	LogEngine.error(`Discord.js Client Error: ${error.stack || error.message}`);
}
