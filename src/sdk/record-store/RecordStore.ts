/**
 * Record Store Contract
 *
 * Key/value persistence for TransferRecords with per-store retention. A
 * record is returned only when its id AND integrity hash match and it has
 * not expired; every other case is indistinguishable from "not found".
 *
 * @module sdk/record-store/RecordStore
 */

import { timingSafeEqual } from 'node:crypto';
import { RecordStats, TransferRecord, TransferRecordDraft } from '../../types/transfer';

export interface RecordStore {
	/**
	 * Stores a draft, stamping `expiresAt` from the store's retention window.
	 * @throws {RecordStoreError} `conflict` when a live record holds the id, `unavailable` otherwise
	 */
	put(draft: TransferRecordDraft): Promise<TransferRecord>;
	get(uniqueId: number, integrityHash: string): Promise<TransferRecord | null>;
	/** Physically removes expired records and returns how many were removed */
	sweepExpired(): Promise<number>;
	stats(): Promise<RecordStats>;
}

// Stand-in compared against when no record exists, so both misses do the same work
const MISSING_HASH = '\0'.repeat(8);

/**
 * Constant-time comparison of a stored hash against a caller-supplied one
 */
export function hashesMatch(stored: string | undefined, supplied: string): boolean {
	const expectedBuffer = Buffer.from(stored ?? MISSING_HASH, 'utf8');
	const receivedBuffer = Buffer.from(supplied, 'utf8');

	if (expectedBuffer.length !== receivedBuffer.length) {
		return false;
	}

	return timingSafeEqual(expectedBuffer, receivedBuffer) && stored !== undefined;
}

export function withRetention(draft: TransferRecordDraft, retentionMs: number): TransferRecord {
	return {
		...draft,
		expiresAt: new Date(draft.createdAt.getTime() + retentionMs),
	};
}
