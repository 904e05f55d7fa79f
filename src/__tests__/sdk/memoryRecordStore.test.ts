/**
 * Test Suite: In-Process Record Store
 *
 * Tests cover retention stamping, hash-gated lookups, id conflicts, sweeping
 * and statistics, all against an injected clock.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryRecordStore } from '@sdk/record-store';
import { RecordStoreError } from '@/types/errors';
import { createRecordDraft } from '@tests/test-utils';

const HOUR_MS = 60 * 60 * 1000;
const START = new Date('2026-01-01T00:00:00.000Z').getTime();

describe('MemoryRecordStore', () => {
	let now: number;
	let store: MemoryRecordStore;

	beforeEach(() => {
		now = START;
		store = new MemoryRecordStore({ retentionMs: HOUR_MS, now: () => now });
	});

	describe('put', () => {
		it('should stamp expiry from the retention window', async () => {
			const record = await store.put(createRecordDraft());

			expect(record.expiresAt.toISOString()).toBe('2026-01-01T01:00:00.000Z');
		});

		it('should default to 24 hours of retention', async () => {
			const defaultStore = new MemoryRecordStore({ now: () => now });

			const record = await defaultStore.put(createRecordDraft());

			expect(record.expiresAt.toISOString()).toBe('2026-01-02T00:00:00.000Z');
		});

		it('should refuse an id held by a live record', async () => {
			await store.put(createRecordDraft());

			await expect(store.put(createRecordDraft({ integrityHash: 'ffff0000' })))
				.rejects.toMatchObject({ name: 'RecordStoreError', code: 'conflict' });
		});

		it('should let an expired record be replaced', async () => {
			await store.put(createRecordDraft());
			now = START + HOUR_MS;

			const replacement = await store.put(createRecordDraft({
				integrityHash: 'ffff0000',
				createdAt: new Date(now),
			}));

			expect(replacement.integrityHash).toBe('ffff0000');
			expect(await store.get(123456, 'ffff0000')).toEqual(replacement);
		});
	});

	describe('get', () => {
		beforeEach(async () => {
			await store.put(createRecordDraft());
		});

		it('should return the record for the right id and hash', async () => {
			const record = await store.get(123456, 'abcd1234');

			expect(record?.fileHandleRef.displayName).toBe('holiday.mp4');
		});

		it('should treat a wrong hash like a missing record', async () => {
			expect(await store.get(123456, 'abcd1235')).toBeNull();
			expect(await store.get(123456, 'short')).toBeNull();
			expect(await store.get(654321, 'abcd1234')).toBeNull();
		});

		it('should stop returning the record at its expiry instant', async () => {
			now = START + HOUR_MS - 1;
			expect(await store.get(123456, 'abcd1234')).not.toBeNull();

			now = START + HOUR_MS;
			expect(await store.get(123456, 'abcd1234')).toBeNull();
		});
	});

	describe('sweepExpired and stats', () => {
		it('should count expired records until they are swept', async () => {
			await store.put(createRecordDraft({ uniqueId: 1 }));
			await store.put(createRecordDraft({ uniqueId: 2, createdAt: new Date(START + 30 * 60 * 1000) }));
			now = START + HOUR_MS + 1;

			expect(await store.stats()).toEqual({ total: 2, active: 1, totalSizeBytes: 2048 });

			expect(await store.sweepExpired()).toBe(1);
			expect(await store.stats()).toEqual({ total: 1, active: 1, totalSizeBytes: 1024 });
		});

		it('should remove nothing on a second sweep', async () => {
			await store.put(createRecordDraft());
			now = START + 2 * HOUR_MS;

			expect(await store.sweepExpired()).toBe(1);
			expect(await store.sweepExpired()).toBe(0);
		});

		it('should remove nothing while records are live', async () => {
			await store.put(createRecordDraft());

			expect(await store.sweepExpired()).toBe(0);
		});
	});

	describe('startSweeper', () => {
		it('should sweep on every interval until stopped', async () => {
			vi.useFakeTimers();
			const sweep = vi.spyOn(store, 'sweepExpired');

			store.startSweeper(1000);
			await vi.advanceTimersByTimeAsync(2500);
			store.stopSweeper();
			await vi.advanceTimersByTimeAsync(5000);

			expect(sweep).toHaveBeenCalledTimes(2);
		});
	});

	it('should raise typed errors', async () => {
		await store.put(createRecordDraft());

		await expect(store.put(createRecordDraft())).rejects.toBeInstanceOf(RecordStoreError);
	});
});
