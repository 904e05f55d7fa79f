/**
 * Pipeline Error Types
 *
 * Error classes raised inside the upload pipeline. Only ValidationError is
 * fatal before any I/O; resolution and link generation errors trigger the
 * hosting fallback, and store errors degrade to reduced functionality.
 * Hosting upload failures are values (TransferError), not exceptions.
 *
 * @module types/errors
 */

/**
 * Input rejected before any network call
 */
export class ValidationError extends Error {
	constructor(
		message: string,
		public readonly sizeBytes: number,
		public readonly limitBytes: number,
	) {
		super(message);
		this.name = 'ValidationError';
	}
}

/**
 * Platform could not produce a server path for a file
 */
export class ResolutionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ResolutionError';
	}
}

/**
 * Instant links could not be built
 */
export class LinkGenerationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'LinkGenerationError';
	}
}

export type RecordStoreErrorCode = 'unavailable' | 'conflict';

/**
 * Record persistence failed; `conflict` means a live record already holds the id
 */
export class RecordStoreError extends Error {
	constructor(
		public readonly code: RecordStoreErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = 'RecordStoreError';
	}
}
