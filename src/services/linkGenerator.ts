/**
 * Link Generator - Instant Links Without Re-Uploading
 *
 * Builds the download, stream and direct URLs for a file whose platform URL
 * could be resolved, and records the short id → file mapping those URLs
 * point at. Returning null is the signal for the orchestrator to fall back
 * to the hosting upload.
 *
 * URL shapes (base from LINK_BASE_URL):
 * - download: `<base>/dl/<uniqueId>/<hash>/<name>`
 * - stream:   `<base>/watch/<uniqueId>/<hash>/<name>` (audio and video only)
 * - direct:   the resolved platform URL itself
 *
 * @module services/linkGenerator
 */

import { createHash } from 'node:crypto';
import { LogEngine } from '../config/logger';
import { RecordStore } from '../sdk/record-store';
import { LinkGenerationError, RecordStoreError } from '../types/errors';
import { FileHandle, IdentifierAllocator, InstantLink, LinkSet, MediaKind, TransferRecordDraft } from '../types/transfer';

const ID_SPACE = 1_000_000;
const MAX_ALLOCATION_ATTEMPTS = 5;
const STREAMABLE_KINDS: ReadonlySet<MediaKind> = new Set([
	MediaKind.Video,
	MediaKind.Audio,
	MediaKind.Voice,
	MediaKind.VideoNote,
]);

/**
 * Short digest of the platform file id used as the lookup capability token
 */
export function computeIntegrityHash(platformFileId: string): string {
	return createHash('sha256').update(platformFileId).digest('hex').slice(0, 8);
}

/**
 * Makes a display name safe for a URL path segment
 *
 * @example
 * sanitizeFileName('My Video (final).mp4'); // "My_Video_final.mp4"
 */
export function sanitizeFileName(name: string): string {
	const cleaned = name
		.trim()
		.replace(/[()]/g, '')
		.replace(/\s+/g, '_');
	return encodeURIComponent(cleaned || 'file');
}

/**
 * Six-digit ids from the millisecond clock, never repeating the previous id
 * within one process unless the id space wraps around
 */
export function createTimeIdAllocator(now: () => number = Date.now): IdentifierAllocator {
	let last = -1;
	return () => {
		let candidate = now() % ID_SPACE;
		if (candidate <= last && last - candidate < ID_SPACE / 2) {
			candidate = (last + 1) % ID_SPACE;
		}
		last = candidate;
		return candidate;
	};
}

export interface LinkGeneratorOptions {
	baseUrl: string;
	now?: () => number;
}

export class LinkGenerator {
	private readonly baseUrl: string;
	private readonly now: () => number;

	constructor(private readonly store: RecordStore, options: LinkGeneratorOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.now = options.now ?? Date.now;
	}

	/**
	 * Builds the link set and writes its record before returning it
	 *
	 * @returns null when no server path was resolved
	 * @throws {LinkGenerationError} when no record id could be claimed
	 */
	async generate(
		handle: FileHandle,
		resolvedServerPath: string | null,
		allocator: IdentifierAllocator,
	): Promise<LinkSet | null> {
		if (!resolvedServerPath || resolvedServerPath.trim() === '') {
			LogEngine.debug(`No server path for ${handle.platformFileId}, instant links unavailable`);
			return null;
		}

		const integrityHash = computeIntegrityHash(handle.platformFileId);
		const fileName = sanitizeFileName(handle.displayName);
		const uniqueId = await this.persist(handle, integrityHash, allocator);

		return {
			uniqueId,
			integrityHash,
			fileName,
			links: this.buildLinks(handle.mediaKind, uniqueId, integrityHash, fileName, resolvedServerPath),
		};
	}

	buildLinks(
		mediaKind: MediaKind,
		uniqueId: number,
		integrityHash: string,
		fileName: string,
		resolvedServerPath: string,
	): InstantLink[] {
		const links: InstantLink[] = [
			{ kind: 'download', url: `${this.baseUrl}/dl/${uniqueId}/${integrityHash}/${fileName}` },
		];
		if (STREAMABLE_KINDS.has(mediaKind)) {
			links.push({ kind: 'stream', url: `${this.baseUrl}/watch/${uniqueId}/${integrityHash}/${fileName}` });
		}
		links.push({ kind: 'direct', url: resolvedServerPath });
		return links;
	}

	/**
	 * Writes the record, re-allocating the id on conflicts. Other write
	 * failures leave the links usable but unrecorded.
	 *
	 * @throws {LinkGenerationError} when every allocated id is held by a live record
	 */
	private async persist(handle: FileHandle, integrityHash: string, allocator: IdentifierAllocator): Promise<number> {
		for (let attempt = 1; attempt <= MAX_ALLOCATION_ATTEMPTS; attempt++) {
			const uniqueId = allocator();
			const draft: TransferRecordDraft = {
				uniqueId,
				integrityHash,
				fileHandleRef: {
					platformFileId: handle.platformFileId,
					platformFileUniqueId: handle.platformFileUniqueId,
					displayName: handle.displayName,
					sizeBytes: handle.sizeBytes,
					mediaKind: handle.mediaKind,
				},
				createdAt: new Date(this.now()),
			};

			try {
				await this.store.put(draft);
				return uniqueId;
			}
			catch (error) {
				if (error instanceof RecordStoreError && error.code === 'conflict') {
					LogEngine.debug(`Record id ${uniqueId} taken (attempt ${attempt}/${MAX_ALLOCATION_ATTEMPTS})`);
					continue;
				}
				LogEngine.error(`Failed to persist record ${uniqueId} for ${handle.displayName}; /info will not find it:`, error instanceof Error ? error.message : String(error));
				return uniqueId;
			}
		}

		// Links under an id owned by another record would never resolve
		throw new LinkGenerationError(`No free record id for ${handle.platformFileId} after ${MAX_ALLOCATION_ATTEMPTS} attempts`);
	}
}
