/**
 * Test Utilities
 *
 * Builders for the pipeline's value types and small in-process fakes.
 *
 * @module __tests__/test-utils
 */

import { vi } from 'vitest';
import { getAllConfig } from '../config/defaults';
import { MemoryRecordStore } from '../sdk/record-store';
import type { ChatPlatform } from '../services/discordPlatform';
import type { ReportAction, StatusReporter } from '../services/statusReporter';
import type { UploadOrchestrator } from '../services/uploadOrchestrator';
import type { BotRuntime } from '../types/discord';
import { FileHandle, MediaKind, TransferRecordDraft } from '../types/transfer';

export function createFileHandle(overrides: Partial<FileHandle> = {}): FileHandle {
	return {
		platformFileId: '111111111111111111:222222222222222222:333333333333333333',
		platformFileUniqueId: 'a1b2c3d4e5f60718',
		displayName: 'holiday.mp4',
		sizeBytes: 5 * 1024 * 1024,
		mediaKind: MediaKind.Video,
		contentType: 'video/mp4',
		...overrides,
	};
}

export function createRecordDraft(overrides: Partial<TransferRecordDraft> = {}): TransferRecordDraft {
	return {
		uniqueId: 123456,
		integrityHash: 'abcd1234',
		fileHandleRef: {
			platformFileId: '111111111111111111:222222222222222222:333333333333333333',
			platformFileUniqueId: 'a1b2c3d4e5f60718',
			displayName: 'holiday.mp4',
			sizeBytes: 1024,
			mediaKind: MediaKind.Video,
		},
		createdAt: new Date('2026-01-01T00:00:00.000Z'),
		...overrides,
	};
}

/**
 * Reporter that records every update and the final message
 */
export interface RecordingReporter extends StatusReporter {
	updates: string[];
	finals: { text: string; actions: ReportAction[] }[];
}

export function createRecordingReporter(): RecordingReporter {
	const updates: string[] = [];
	const finals: { text: string; actions: ReportAction[] }[] = [];

	return {
		updates,
		finals,
		update: vi.fn((text: string) => {
			updates.push(text);
		}),
		finish: vi.fn(async (text: string, actions: ReportAction[] = []) => {
			finals.push({ text, actions });
		}),
	};
}

/**
 * Runtime with a real memory store and mocked pipeline collaborators
 */
export function createTestRuntime(overrides: Partial<BotRuntime> = {}) {
	const memoryStore = new MemoryRecordStore();
	const orchestrator = {
		run: vi.fn().mockResolvedValue({ kind: 'hosted_link', url: 'https://gofile.io/d/test' }),
		backup: vi.fn().mockResolvedValue({ kind: 'hosted_link', url: 'https://gofile.io/d/test' }),
	};
	const platform = {
		resolveServerPath: vi.fn().mockResolvedValue(null),
		downloadBytes: vi.fn(),
		findHandle: vi.fn().mockResolvedValue(null),
	};

	const runtime: BotRuntime = {
		config: { ...getAllConfig(), ADMIN_USER_IDS: [] },
		orchestrator: orchestrator as unknown as UploadOrchestrator,
		platform: platform satisfies ChatPlatform,
		recordStore: memoryStore,
		memoryStore,
		...overrides,
	};

	return { runtime, orchestrator, platform, memoryStore };
}
