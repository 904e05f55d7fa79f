/**
 * Resilient Record Store - Durable Primary With In-Process Fallback
 *
 * 🔄 DATA FLOW:
 * ============
 * WRITE: durable → memory (only when the durable write is unavailable)
 * READ:  durable → memory (first hit wins; durable errors count as a miss)
 *
 * A `conflict` from the durable store is passed through untouched so the
 * caller allocates a new id instead of shadowing a live record in memory.
 *
 * @module sdk/record-store/ResilientRecordStore
 */

import { LogEngine } from '../../config/logger';
import { RecordStoreError } from '../../types/errors';
import { RecordStats, TransferRecord, TransferRecordDraft } from '../../types/transfer';
import { RecordStore } from './RecordStore';

export class ResilientRecordStore implements RecordStore {
	constructor(
		private readonly primary: RecordStore,
		private readonly fallback: RecordStore,
	) {}

	async put(draft: TransferRecordDraft): Promise<TransferRecord> {
		try {
			return await this.primary.put(draft);
		}
		catch (error) {
			if (error instanceof RecordStoreError && error.code === 'conflict') {
				throw error;
			}
			LogEngine.warn(`Durable store unavailable, keeping record ${draft.uniqueId} in memory:`, error instanceof Error ? error.message : String(error));
			return await this.fallback.put(draft);
		}
	}

	async get(uniqueId: number, integrityHash: string): Promise<TransferRecord | null> {
		try {
			const record = await this.primary.get(uniqueId, integrityHash);
			if (record) {
				return record;
			}
		}
		catch (error) {
			LogEngine.warn(`Durable lookup failed for record ${uniqueId}, checking memory:`, error instanceof Error ? error.message : String(error));
		}
		return this.fallback.get(uniqueId, integrityHash);
	}

	async sweepExpired(): Promise<number> {
		let removed = 0;
		try {
			removed += await this.primary.sweepExpired();
		}
		catch (error) {
			LogEngine.error('Durable record sweep failed:', error);
		}
		removed += await this.fallback.sweepExpired();
		return removed;
	}

	async stats(): Promise<RecordStats> {
		const fallbackStats = await this.fallback.stats();
		try {
			const primaryStats = await this.primary.stats();
			return {
				total: primaryStats.total + fallbackStats.total,
				active: primaryStats.active + fallbackStats.active,
				totalSizeBytes: primaryStats.totalSizeBytes + fallbackStats.totalSizeBytes,
			};
		}
		catch (error) {
			LogEngine.error('Durable record stats failed:', error);
			return fallbackStats;
		}
	}
}
