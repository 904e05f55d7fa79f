/**
 * Upload Orchestrator - File Pipeline State Machine
 *
 * Drives one inbound file to exactly one outcome and reports it.
 *
 * 🔄 STATES:
 * =========
 * received → resolving → link_path → reporting → done
 *                      ↘ transfer_path ↗          ↘ failed
 *
 * - received: size is checked against the ceiling before any network call
 * - resolving: the platform is asked for a server path within a time budget;
 *   no path means transfer_path, not failure
 * - link_path: instant links are built; if that fails, transfer_path runs once
 * - transfer_path: download from the platform, upload to GoFile
 * - reporting: the final text is delivered; delivery problems never change
 *   the outcome
 *
 * A backup request re-enters at transfer_path with the original handle.
 *
 * @module services/uploadOrchestrator
 */

import { LogEngine } from '../config/logger';
import { BACKUP_ACTION_PREFIX, renderOutcome, renderStatus, truncateDiagnostic } from '../config/messages';
import { LinkGenerationError, ResolutionError, ValidationError } from '../types/errors';
import { FileHandle, IdentifierAllocator, LinkSet, PipelineState, TransferResult, UploadOutcome } from '../types/transfer';
import { ProgressCallback } from './transferClient';
import { StatusReporter } from './statusReporter';

export interface OrchestratorDependencies {
	resolveServerPath: (platformFileId: string) => Promise<string | null>;
	downloadBytes: (handle: FileHandle) => Promise<string>;
	linkGenerator: {
		generate(handle: FileHandle, resolvedServerPath: string | null, allocator: IdentifierAllocator): Promise<LinkSet | null>;
	};
	transferClient: {
		upload(localPath: string, declaredName: string, sizeHint: number, onProgress?: ProgressCallback): Promise<TransferResult>;
	};
	allocator: IdentifierAllocator;
	maxFileSize: number;
	resolveTimeoutMs: number;
	now?: () => number;
	/** Observes every state a run enters */
	onTransition?: (state: PipelineState, handle: FileHandle) => void;
}

type Entry = 'start' | 'backup';

export class UploadOrchestrator {
	private readonly now: () => number;

	constructor(private readonly deps: OrchestratorDependencies) {
		this.now = deps.now ?? Date.now;
	}

	/**
	 * Runs the full pipeline for a newly received file
	 */
	async run(handle: FileHandle, reporter: StatusReporter): Promise<UploadOutcome> {
		return this.execute(handle, reporter, 'start');
	}

	/**
	 * Uploads a file to the hosting service after instant links were issued
	 */
	async backup(handle: FileHandle, reporter: StatusReporter): Promise<UploadOutcome> {
		return this.execute(handle, reporter, 'backup');
	}

	private async execute(handle: FileHandle, reporter: StatusReporter, entry: Entry): Promise<UploadOutcome> {
		const startedAt = this.now();
		this.enter('received', handle);

		let outcome: UploadOutcome;
		try {
			this.validate(handle);
			outcome = entry === 'backup'
				? await this.transferPath(handle, reporter)
				: await this.resolveAndLink(handle, reporter);
		}
		catch (error) {
			if (error instanceof ValidationError) {
				LogEngine.warn(`Rejected ${handle.displayName}: ${error.message}`);
				outcome = { kind: 'failed', reason: 'too_large' };
			}
			else {
				const message = error instanceof Error ? error.message : String(error);
				LogEngine.error(`Pipeline for ${handle.displayName} (${handle.platformFileId}) failed unexpectedly:`, error);
				outcome = { kind: 'failed', reason: 'internal_error', diagnostic: truncateDiagnostic(message) };
			}
		}

		await this.report(handle, outcome, reporter, this.now() - startedAt);
		this.enter(outcome.kind === 'failed' ? 'failed' : 'done', handle);
		LogEngine.info(`Pipeline for ${handle.displayName} finished: ${outcome.kind}${outcome.kind === 'failed' ? ` (${outcome.reason})` : ''}`);
		return outcome;
	}

	private validate(handle: FileHandle): void {
		if (handle.sizeBytes > this.deps.maxFileSize) {
			throw new ValidationError(
				`${handle.sizeBytes} bytes exceeds the ${this.deps.maxFileSize} byte ceiling`,
				handle.sizeBytes,
				this.deps.maxFileSize,
			);
		}
	}

	private async resolveAndLink(handle: FileHandle, reporter: StatusReporter): Promise<UploadOutcome> {
		this.enter('resolving', handle);
		reporter.update(renderStatus(handle, '🔍 Preparing links...'));

		const serverPath = await this.resolveWithinBudget(handle);
		if (!serverPath) {
			return this.transferPath(handle, reporter);
		}

		this.enter('link_path', handle);
		try {
			const linkSet = await this.deps.linkGenerator.generate(handle, serverPath, this.deps.allocator);
			if (linkSet) {
				return { kind: 'instant_links', linkSet };
			}
			LogEngine.info(`Instant links unavailable for ${handle.displayName}, falling back to hosting upload`);
		}
		catch (error) {
			const linkError = new LinkGenerationError(`Link generation failed for ${handle.platformFileId}`, { cause: error });
			LogEngine.warn(`${linkError.message}, falling back to hosting upload:`, error instanceof Error ? error.message : String(error));
		}

		return this.transferPath(handle, reporter);
	}

	private async resolveWithinBudget(handle: FileHandle): Promise<string | null> {
		const budgetMs = this.deps.resolveTimeoutMs;
		let timeoutId: NodeJS.Timeout | undefined;

		const timeout = new Promise<null>(resolve => {
			timeoutId = setTimeout(() => {
				LogEngine.warn(`Resolving ${handle.platformFileId} exceeded ${budgetMs}ms`);
				resolve(null);
			}, budgetMs);
		});

		const resolution = this.deps.resolveServerPath(handle.platformFileId).catch((error: unknown) => {
			const resolutionError = new ResolutionError(`Could not resolve ${handle.platformFileId}`, { cause: error });
			LogEngine.warn(`${resolutionError.message}:`, error instanceof Error ? error.message : String(error));
			return null;
		});

		try {
			const serverPath = await Promise.race([resolution, timeout]);
			return serverPath && serverPath.trim() !== '' ? serverPath : null;
		}
		finally {
			clearTimeout(timeoutId);
		}
	}

	private async transferPath(handle: FileHandle, reporter: StatusReporter): Promise<UploadOutcome> {
		this.enter('transfer_path', handle);
		reporter.update(renderStatus(handle, '⬇️ Downloading...'));

		let localPath: string;
		try {
			localPath = await this.deps.downloadBytes(handle);
		}
		catch (error) {
			LogEngine.error(`Download of ${handle.displayName} failed:`, error instanceof Error ? error.message : String(error));
			return { kind: 'failed', reason: 'download_error' };
		}

		const result = await this.deps.transferClient.upload(
			localPath,
			handle.displayName,
			handle.sizeBytes,
			status => reporter.update(renderStatus(handle, status)),
		);

		if (result.ok) {
			return { kind: 'hosted_link', url: result.url };
		}
		return { kind: 'failed', reason: 'upload_error', transferError: result.error };
	}

	private async report(handle: FileHandle, outcome: UploadOutcome, reporter: StatusReporter, elapsedMs: number): Promise<void> {
		this.enter('reporting', handle);
		const text = renderOutcome(handle, outcome, this.deps.maxFileSize, elapsedMs);
		const actions = outcome.kind === 'instant_links'
			? [{ id: `${BACKUP_ACTION_PREFIX}${handle.platformFileId}`, label: 'Back up to GoFile' }]
			: [];

		try {
			await reporter.finish(text, actions);
		}
		catch (error) {
			LogEngine.error(`Failed to report outcome for ${handle.displayName}:`, error);
		}
	}

	private enter(state: PipelineState, handle: FileHandle): void {
		LogEngine.debug(`[${handle.platformFileId}] → ${state}`);
		this.deps.onTransition?.(state, handle);
	}
}
