/**
 * File Transfer Types
 *
 * Type definitions for the upload pipeline: the inbound file reference, the
 * persisted short-id record, instant link sets and the terminal outcome of a
 * pipeline run.
 *
 * @module types/transfer
 */

/**
 * Kind of media a file was sent as, decided once at ingestion
 */
export enum MediaKind {
	Document = 'document',
	Photo = 'photo',
	Video = 'video',
	Audio = 'audio',
	Voice = 'voice',
	VideoNote = 'video_note',
	Sticker = 'sticker',
}

/**
 * Immutable reference to one piece of inbound content on the chat platform
 */
export interface FileHandle {
	/** Opaque id used to re-resolve a server path or download the bytes */
	readonly platformFileId: string;
	/** Stable across re-sends of the same content */
	readonly platformFileUniqueId: string;
	readonly displayName: string;
	readonly sizeBytes: number;
	readonly mediaKind: MediaKind;
	/** MIME type reported by the platform, when known */
	readonly contentType?: string;
}

/**
 * Copy of the FileHandle fields kept with a record
 */
export type FileHandleRef = Pick<FileHandle, 'platformFileId' | 'platformFileUniqueId' | 'displayName' | 'sizeBytes' | 'mediaKind'>;

/**
 * Record as produced by the link generator, before a store stamps its expiry
 */
export interface TransferRecordDraft {
	uniqueId: number;
	integrityHash: string;
	fileHandleRef: FileHandleRef;
	createdAt: Date;
}

/**
 * Persisted mapping from a short public identifier to file provenance
 */
export interface TransferRecord extends TransferRecordDraft {
	expiresAt: Date;
}

/**
 * Aggregate counters reported by a record store
 */
export interface RecordStats {
	/** Records physically present, expired or not */
	total: number;
	/** Records that lookups would still return */
	active: number;
	totalSizeBytes: number;
}

export type InstantLinkKind = 'download' | 'stream' | 'direct';

export interface InstantLink {
	kind: InstantLinkKind;
	url: string;
}

/**
 * URLs derived from id + hash + name, served without re-uploading content
 */
export interface LinkSet {
	uniqueId: number;
	integrityHash: string;
	fileName: string;
	links: InstantLink[];
}

/**
 * Produces the 6-digit public identifier for a new record
 */
export type IdentifierAllocator = () => number;

/**
 * Failure modes of the outbound hosting upload
 */
export type TransferErrorKind =
	| 'http'
	| 'empty_response'
	| 'malformed_response'
	| 'rejected'
	| 'incomplete_result'
	| 'timeout'
	| 'connection';

export interface TransferError {
	kind: TransferErrorKind;
	/** Diagnostic detail for logs; never shown to users */
	detail: string;
	status?: number;
}

export type TransferResult =
	| { ok: true; url: string }
	| { ok: false; error: TransferError };

export type FailureReason = 'too_large' | 'download_error' | 'upload_error' | 'internal_error';

/**
 * Terminal result of one pipeline run
 */
export type UploadOutcome =
	| { kind: 'instant_links'; linkSet: LinkSet }
	| { kind: 'hosted_link'; url: string }
	| { kind: 'failed'; reason: FailureReason; transferError?: TransferError; diagnostic?: string };

/**
 * States the upload orchestrator moves through
 */
export type PipelineState =
	| 'received'
	| 'resolving'
	| 'link_path'
	| 'transfer_path'
	| 'reporting'
	| 'done'
	| 'failed';
