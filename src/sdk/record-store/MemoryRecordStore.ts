/**
 * In-Process Record Store
 *
 * Map-backed fallback store used when no durable database is configured or
 * reachable. Records live for 24 hours by default and are physically removed
 * by sweepExpired(), which runs from the /cleanup command and, optionally, an
 * interval started with startSweeper().
 *
 * Every method completes its map mutation without awaiting, so concurrent
 * pipeline runs on the event loop never observe a half-applied write.
 *
 * @module sdk/record-store/MemoryRecordStore
 */

import { LogEngine } from '../../config/logger';
import { DEFAULT_CONFIG } from '../../config/defaults';
import { RecordStoreError } from '../../types/errors';
import { RecordStats, TransferRecord, TransferRecordDraft } from '../../types/transfer';
import { RecordStore, hashesMatch, withRetention } from './RecordStore';

export interface MemoryRecordStoreOptions {
	retentionMs?: number;
	now?: () => number;
}

export class MemoryRecordStore implements RecordStore {
	private readonly records = new Map<number, TransferRecord>();
	private readonly retentionMs: number;
	private readonly now: () => number;
	private sweeper: NodeJS.Timeout | null = null;

	constructor(options: MemoryRecordStoreOptions = {}) {
		this.retentionMs = options.retentionMs ?? DEFAULT_CONFIG.MEMORY_RETENTION_MS;
		this.now = options.now ?? Date.now;
	}

	async put(draft: TransferRecordDraft): Promise<TransferRecord> {
		const existing = this.records.get(draft.uniqueId);
		if (existing && !this.isExpired(existing)) {
			throw new RecordStoreError('conflict', `Record ${draft.uniqueId} is already in use`);
		}

		const record = withRetention(draft, this.retentionMs);
		this.records.set(record.uniqueId, record);
		LogEngine.debug(`Stored in-memory record ${record.uniqueId} until ${record.expiresAt.toISOString()}`);
		return record;
	}

	async get(uniqueId: number, integrityHash: string): Promise<TransferRecord | null> {
		const record = this.records.get(uniqueId);
		const matches = hashesMatch(record?.integrityHash, integrityHash);

		if (!record || !matches || this.isExpired(record)) {
			return null;
		}
		return record;
	}

	async sweepExpired(): Promise<number> {
		let removed = 0;
		for (const [uniqueId, record] of this.records) {
			if (record.expiresAt.getTime() < this.now()) {
				this.records.delete(uniqueId);
				removed++;
			}
		}

		if (removed > 0) {
			LogEngine.info(`Swept ${removed} expired in-memory record(s)`);
		}
		return removed;
	}

	async stats(): Promise<RecordStats> {
		let active = 0;
		let totalSizeBytes = 0;
		for (const record of this.records.values()) {
			totalSizeBytes += record.fileHandleRef.sizeBytes;
			if (!this.isExpired(record)) {
				active++;
			}
		}
		return { total: this.records.size, active, totalSizeBytes };
	}

	/**
	 * Starts periodic sweeping; the timer does not keep the process alive
	 */
	startSweeper(intervalMs: number): void {
		this.stopSweeper();
		this.sweeper = setInterval(() => {
			this.sweepExpired().catch((error: unknown) => {
				LogEngine.error('Scheduled record sweep failed:', error);
			});
		}, intervalMs);
		this.sweeper.unref();
	}

	stopSweeper(): void {
		if (this.sweeper) {
			clearInterval(this.sweeper);
			this.sweeper = null;
		}
	}

	private isExpired(record: TransferRecord): boolean {
		return this.now() >= record.expiresAt.getTime();
	}
}
