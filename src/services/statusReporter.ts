/**
 * Status Reporter - Throttled Progress Messages
 *
 * The pipeline pushes short status texts while it works; the reporter turns
 * them into edits of one chat message. Discord rate-limits message edits, so
 * intermediate updates closer together than the minimum interval are dropped,
 * not queued. The final text always goes through.
 *
 * @module services/statusReporter
 */

import { LogEngine } from '../config/logger';
import { DEFAULT_CONFIG } from '../config/defaults';

/**
 * Follow-up action offered alongside a final message (a button on Discord)
 */
export interface ReportAction {
	id: string;
	label: string;
}

/**
 * Progress sink consumed by the upload orchestrator
 */
export interface StatusReporter {
	/** Intermediate progress; may be dropped */
	update(text: string): void;
	/** Terminal text; always delivered, errors are logged */
	finish(text: string, actions?: ReportAction[]): Promise<void>;
}

/**
 * Applies a text to the underlying status message
 */
export type MessageEditor = (text: string, actions: ReportAction[]) => Promise<void>;

export interface ThrottleOptions {
	minIntervalMs?: number;
	now?: () => number;
}

export class ThrottledStatusReporter implements StatusReporter {
	private readonly minIntervalMs: number;
	private readonly now: () => number;
	// The message was just sent, which counts as the first edit
	private lastEditAt: number;

	constructor(private readonly editor: MessageEditor, options: ThrottleOptions = {}) {
		this.minIntervalMs = options.minIntervalMs ?? DEFAULT_CONFIG.STATUS_UPDATE_INTERVAL_MS;
		this.now = options.now ?? Date.now;
		this.lastEditAt = this.now();
	}

	update(text: string): void {
		const now = this.now();
		if (now - this.lastEditAt < this.minIntervalMs) {
			LogEngine.debug(`Dropping status update within ${this.minIntervalMs}ms window: ${text}`);
			return;
		}

		this.lastEditAt = now;
		this.editor(text, []).catch((error: unknown) => {
			LogEngine.debug('Status message edit failed:', error instanceof Error ? error.message : String(error));
		});
	}

	async finish(text: string, actions: ReportAction[] = []): Promise<void> {
		this.lastEditAt = this.now();
		try {
			await this.editor(text, actions);
		}
		catch (error) {
			LogEngine.warn('Failed to deliver final status message:', error instanceof Error ? error.message : String(error));
		}
	}
}
