/**
 * Test Suite: Runtime Composition
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { Client } from 'discord.js';
import { getAllConfig } from '@config/defaults';
import { createRecordStores, createRuntime, type RecordStores } from '@/runtime';
import { MemoryRecordStore } from '@sdk/record-store';
import { DiscordPlatform } from '@services/discordPlatform';
import { UploadOrchestrator } from '@services/uploadOrchestrator';

describe('runtime composition', () => {
	let stores: RecordStores | undefined;

	afterEach(() => {
		stores?.memoryStore.stopSweeper();
		stores = undefined;
	});

	it('should keep records in memory only without a database URL', async () => {
		stores = await createRecordStores({ ...getAllConfig(), POSTGRES_URL: undefined });

		expect(stores.recordStore).toBe(stores.memoryStore);
		expect(stores.memoryStore).toBeInstanceOf(MemoryRecordStore);
		expect(stores.pool).toBeNull();
	});

	it('should wire the pipeline around the chosen store', async () => {
		const config = { ...getAllConfig(), POSTGRES_URL: undefined };
		stores = await createRecordStores(config);

		const runtime = createRuntime({} as Client, config, stores);

		expect(runtime.orchestrator).toBeInstanceOf(UploadOrchestrator);
		expect(runtime.platform).toBeInstanceOf(DiscordPlatform);
		expect(runtime.recordStore).toBe(stores.recordStore);
		expect(runtime.config).toBe(config);
	});
});
