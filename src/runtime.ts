/**
 * Runtime Composition
 *
 * Builds the record stores and the upload pipeline from configuration. With
 * POSTGRES_URL set, records live in Postgres and fall back to memory while
 * the database is unreachable; without it, memory is the only store.
 *
 * @module runtime
 */

import type { Pool } from 'pg';
import type { Client } from 'discord.js';
import { AppConfig } from './config/defaults';
import { LogEngine } from './config/logger';
import { createPostgresPool, MemoryRecordStore, PostgresRecordStore, RecordStore, ResilientRecordStore } from './sdk/record-store';
import { DiscordPlatform } from './services/discordPlatform';
import { createTimeIdAllocator, LinkGenerator } from './services/linkGenerator';
import { TransferClient } from './services/transferClient';
import { UploadOrchestrator } from './services/uploadOrchestrator';
import { BotRuntime } from './types/discord';
import { withRetry } from './utils/retry';

const SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export interface RecordStores {
	recordStore: RecordStore;
	memoryStore: MemoryRecordStore;
	pool: Pool | null;
}

export async function createRecordStores(config: AppConfig): Promise<RecordStores> {
	const memoryStore = new MemoryRecordStore();
	memoryStore.startSweeper(SWEEP_INTERVAL_MS);

	if (!config.POSTGRES_URL) {
		LogEngine.warn('POSTGRES_URL not set - link records are kept in memory only and lost on restart');
		return { recordStore: memoryStore, memoryStore, pool: null };
	}

	const pool = createPostgresPool(config.POSTGRES_URL, config.NODE_ENV);
	const postgresStore = new PostgresRecordStore(pool);

	try {
		await withRetry(
			async () => postgresStore.initialize(),
			{ operationName: 'record schema initialisation', exponentialBackoff: true },
		);
		LogEngine.info('PostgreSQL record store ready');
	}
	catch (error) {
		LogEngine.error('PostgreSQL unavailable at startup, records fall back to memory until it recovers:', error instanceof Error ? error.message : String(error));
	}

	return { recordStore: new ResilientRecordStore(postgresStore, memoryStore), memoryStore, pool };
}

export function createRuntime(client: Client, config: AppConfig, stores: RecordStores): BotRuntime {
	const platform = new DiscordPlatform(client);
	const orchestrator = new UploadOrchestrator({
		resolveServerPath: platformFileId => platform.resolveServerPath(platformFileId),
		downloadBytes: handle => platform.downloadBytes(handle),
		linkGenerator: new LinkGenerator(stores.recordStore, { baseUrl: config.LINK_BASE_URL }),
		transferClient: new TransferClient(),
		allocator: createTimeIdAllocator(),
		maxFileSize: config.MAX_FILE_SIZE,
		resolveTimeoutMs: config.RESOLVE_TIMEOUT_MS,
	});

	return {
		config,
		orchestrator,
		platform,
		recordStore: stores.recordStore,
		memoryStore: stores.memoryStore,
	};
}
