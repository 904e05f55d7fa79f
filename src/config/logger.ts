/**
 * Log Engine Configuration
 *
 * Configures @wgtechlabs/log-engine for the file relay bot.
 *
 * Configuration:
 * - Uses LogMode.DEBUG when NODE_ENV=development or undefined, otherwise LogMode.INFO
 * - Excludes ISO timestamps (includeIsoTimestamp: false)
 * - Includes local time formatting (includeLocalTime: true)
 *
 * @module config/logger
 */

import { LogEngine, LogMode } from '@wgtechlabs/log-engine';
import { isDevelopment } from './defaults';

// In development mode (or undefined NODE_ENV), show all logs; otherwise show info and above
const logMode = isDevelopment ? LogMode.DEBUG : LogMode.INFO;

LogEngine.configure({
	mode: logMode,
	format: {
		includeIsoTimestamp: false,
		includeLocalTime: true,
	},
});

export { LogEngine };

export { LogMode };
