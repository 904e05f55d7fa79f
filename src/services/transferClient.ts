/**
 * Transfer Client - GoFile Hosting Upload
 *
 * @description
 * Uploads a downloaded file to GoFile's anonymous hosting and returns the
 * public download page. One attempt per call: failures come back as a
 * TransferError value and the orchestrator decides what to tell the user.
 *
 * 🔄 PROCESSING FLOW:
 * ==================
 * 1. Ask the server-selection endpoint for an upload server (best effort, 10s)
 * 2. Derive the request timeout from the declared size
 * 3. POST the file as a single multipart field to https://{server}.gofile.io/uploadFile
 * 4. Parse the JSON envelope `{ status, data: { downloadPage } }`
 * 5. Delete the local file, whatever happened above
 *
 * @module services/transferClient
 */

import { openAsBlob } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as mime from 'mime-types';
import { LogEngine } from '../config/logger';
import { DEFAULT_CONFIG } from '../config/defaults';
import { TransferError, TransferErrorKind, TransferResult } from '../types/transfer';

const MIB = 1024 * 1024;

// Server names are interpolated into a hostname
const SERVER_NAME = /^[a-z0-9-]{1,63}$/i;

export type ProgressCallback = (status: string) => void;

export interface TransferClientOptions {
	serverEndpoint?: string;
	uploadHost?: string;
	defaultServer?: string;
	serverTimeoutMs?: number;
}

/**
 * Per-attempt upload timeout: 15s per MiB, clamped to [300s, 1800s]
 */
export function computeUploadTimeout(sizeBytes: number): number {
	const scaled = (sizeBytes / MIB) * DEFAULT_CONFIG.UPLOAD_TIMEOUT_PER_MIB_MS;
	return Math.min(
		DEFAULT_CONFIG.UPLOAD_TIMEOUT_MAX_MS,
		Math.max(DEFAULT_CONFIG.UPLOAD_TIMEOUT_MIN_MS, scaled),
	);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function failure(kind: TransferErrorKind, detail: string, status?: number): TransferResult {
	const error: TransferError = status === undefined ? { kind, detail } : { kind, detail, status };
	return { ok: false, error };
}

/**
 * Classifies an upload response; only a complete success envelope yields a URL
 */
export function parseUploadResponse(status: number, body: string): TransferResult {
	if (status !== 200) {
		return failure('http', `HTTP ${status}`, status);
	}

	if (!body.trim()) {
		return failure('empty_response', 'Empty response body');
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	}
	catch {
		return failure('malformed_response', `Unparseable body: ${body.slice(0, 200)}`);
	}

	if (!isRecord(parsed)) {
		return failure('malformed_response', 'Response is not a JSON object');
	}

	if (parsed.status !== 'ok') {
		return failure('rejected', `Service status: ${String(parsed.status)}`);
	}

	const data = parsed.data;
	const downloadPage = isRecord(data) ? data.downloadPage : undefined;
	if (typeof downloadPage !== 'string' || downloadPage.trim() === '') {
		return failure('incomplete_result', 'Success response without data.downloadPage');
	}

	return { ok: true, url: downloadPage };
}

function isAbortError(error: unknown): boolean {
	return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export class TransferClient {
	private readonly serverEndpoint: string;
	private readonly uploadHost: string;
	private readonly defaultServer: string;
	private readonly serverTimeoutMs: number;

	constructor(options: TransferClientOptions = {}) {
		this.serverEndpoint = options.serverEndpoint ?? DEFAULT_CONFIG.GOFILE_SERVER_ENDPOINT;
		this.uploadHost = options.uploadHost ?? DEFAULT_CONFIG.GOFILE_UPLOAD_HOST;
		this.defaultServer = options.defaultServer ?? DEFAULT_CONFIG.GOFILE_DEFAULT_SERVER;
		this.serverTimeoutMs = options.serverTimeoutMs ?? DEFAULT_CONFIG.GOFILE_SERVER_TIMEOUT_MS;
	}

	/**
	 * Asks GoFile for an upload server, falling back to the default on any failure
	 */
	async selectServer(): Promise<string> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.serverTimeoutMs);

		try {
			const response = await fetch(this.serverEndpoint, {
				method: 'GET',
				signal: controller.signal,
			});

			if (response.status !== 200) {
				LogEngine.warn(`Server selection returned HTTP ${response.status}, using ${this.defaultServer}`);
				return this.defaultServer;
			}

			const payload: unknown = await response.json();
			const data = isRecord(payload) && payload.status === 'ok' ? payload.data : undefined;
			const server = isRecord(data) ? data.server : undefined;

			if (typeof server === 'string' && SERVER_NAME.test(server)) {
				LogEngine.debug(`Selected upload server ${server}`);
				return server;
			}

			LogEngine.warn(`Server selection response was not usable, using ${this.defaultServer}`);
			return this.defaultServer;
		}
		catch (error) {
			LogEngine.warn(`Server selection failed, using ${this.defaultServer}:`, error instanceof Error ? error.message : String(error));
			return this.defaultServer;
		}
		finally {
			clearTimeout(timeoutId);
		}
	}

	/**
	 * Uploads a local file and deletes it afterwards
	 *
	 * @param localPath - Temporary download owned by the calling pipeline run
	 * @param declaredName - File name sent to the hosting service
	 * @param sizeHint - Declared size, used for the timeout
	 * @param onProgress - Receives short status texts
	 */
	async upload(
		localPath: string,
		declaredName: string,
		sizeHint: number,
		onProgress: ProgressCallback = () => undefined,
	): Promise<TransferResult> {
		const timeoutMs = computeUploadTimeout(sizeHint);
		const controller = new AbortController();
		let timeoutId: NodeJS.Timeout | undefined;

		try {
			this.notify(onProgress, '📡 Selecting upload server...');
			const server = await this.selectServer();
			const uploadUrl = `https://${server}.${this.uploadHost}/uploadFile`;

			const contentType = mime.lookup(declaredName) || 'application/octet-stream';
			const file = await openAsBlob(localPath, { type: contentType });
			const formData = new FormData();
			formData.append('file', file, declaredName);

			LogEngine.info(`Uploading ${declaredName} (${sizeHint} bytes) to ${uploadUrl} with ${timeoutMs / 1000}s timeout`);
			this.notify(onProgress, '📤 Uploading to GoFile...');

			timeoutId = setTimeout(() => controller.abort(), timeoutMs);
			const response = await fetch(uploadUrl, {
				method: 'POST',
				// Content-Type with boundary comes from FormData
				body: formData,
				signal: controller.signal,
			});
			const body = await response.text();

			const result = parseUploadResponse(response.status, body);
			if (result.ok) {
				LogEngine.info(`Upload of ${declaredName} complete: ${result.url}`);
			}
			else {
				LogEngine.error(`Upload of ${declaredName} failed (${result.error.kind}): ${result.error.detail}`);
			}
			return result;
		}
		catch (error) {
			if (isAbortError(error)) {
				LogEngine.error(`Upload of ${declaredName} timed out after ${timeoutMs / 1000}s`);
				return failure('timeout', `No response within ${timeoutMs}ms`);
			}
			const detail = error instanceof Error ? error.message : String(error);
			LogEngine.error(`Upload of ${declaredName} failed before a response arrived: ${detail}`);
			return failure('connection', detail);
		}
		finally {
			if (timeoutId) {
				clearTimeout(timeoutId);
			}
			await removeLocalFile(localPath);
		}
	}

	private notify(onProgress: ProgressCallback, status: string): void {
		try {
			onProgress(status);
		}
		catch (error) {
			LogEngine.debug('Progress callback threw:', error);
		}
	}
}

/**
 * Deletes a temporary file; failures are logged and never escalated
 */
export async function removeLocalFile(localPath: string): Promise<void> {
	try {
		await fs.rm(localPath, { force: true });
		LogEngine.debug(`Cleaned up file: ${localPath}`);
	}
	catch (error) {
		LogEngine.warn(`Failed to clean up file ${localPath}:`, error instanceof Error ? error.message : String(error));
	}
}
