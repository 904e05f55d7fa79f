/**
 * Link Server Module
 *
 * Serves the instant links handed out by the bot. Nothing is proxied: each
 * request looks the short id up, asks the platform for a fresh URL, and
 * redirects to it.
 *
 * Routes:
 * - GET /dl/:uniqueId/:hash/:name    → 302 to the platform URL
 * - GET /watch/:uniqueId/:hash/:name → HTML player pointing at /dl
 * - GET /health                      → liveness probe
 *
 * Unknown ids, wrong hashes and expired records all answer 404, so a guessed
 * id reveals nothing.
 *
 * @module services/linkServer
 */

import type { Server } from 'node:http';
import express, { NextFunction, Request, Response } from 'express';
import { LogEngine } from '../config/logger';
import { RecordStore } from '../sdk/record-store';
import { MediaKind, TransferRecord } from '../types/transfer';
import { escapeHtml } from '../utils/escapeHtml';
import { ChatPlatform } from './discordPlatform';

const UNIQUE_ID = /^\d{1,6}$/;
const INTEGRITY_HASH = /^[0-9a-f]{8}$/;
const AUDIO_KINDS: ReadonlySet<MediaKind> = new Set([MediaKind.Audio, MediaKind.Voice]);
const PLAYABLE_KINDS: ReadonlySet<MediaKind> = new Set([...AUDIO_KINDS, MediaKind.Video, MediaKind.VideoNote]);

export interface LinkServerDependencies {
	recordStore: RecordStore;
	platform: Pick<ChatPlatform, 'resolveServerPath'>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export interface LinkHandlers {
	download: AsyncHandler;
	watch: AsyncHandler;
	health: AsyncHandler;
}

/**
 * Renders the player page for a streamable record
 */
export function renderPlayerPage(record: TransferRecord, downloadPath: string): string {
	const title = escapeHtml(record.fileHandleRef.displayName);
	const source = escapeHtml(downloadPath);
	const player = AUDIO_KINDS.has(record.fileHandleRef.mediaKind)
		? `<audio controls autoplay src="${source}"></audio>`
		: `<video controls autoplay playsinline src="${source}"></video>`;

	return [
		'<!DOCTYPE html>',
		'<html lang="en">',
		'<head>',
		'<meta charset="utf-8">',
		'<meta name="viewport" content="width=device-width, initial-scale=1">',
		`<title>${title}</title>`,
		'<style>body{margin:0;background:#111;color:#eee;font-family:sans-serif;display:flex;flex-direction:column;align-items:center;justify-content:center;min-height:100vh}video,audio{max-width:100%;max-height:85vh}</style>',
		'</head>',
		'<body>',
		`<h3>${title}</h3>`,
		player,
		`<p><a href="${source}" style="color:#8ab4f8">Download</a></p>`,
		'</body>',
		'</html>',
	].join('\n');
}

export function createLinkHandlers(deps: LinkServerDependencies): LinkHandlers {
	async function lookup(req: Request): Promise<TransferRecord | null> {
		const { uniqueId, hash } = req.params;
		if (!UNIQUE_ID.test(uniqueId) || !INTEGRITY_HASH.test(hash)) {
			return null;
		}
		return deps.recordStore.get(Number(uniqueId), hash);
	}

	async function download(req: Request, res: Response): Promise<void> {
		try {
			const record = await lookup(req);
			if (!record) {
				res.status(404).send('Link not found or expired');
				return;
			}

			const url = await deps.platform.resolveServerPath(record.fileHandleRef.platformFileId);
			if (!url) {
				LogEngine.warn(`Record ${record.uniqueId} exists but its file could not be resolved`);
				res.status(502).send('File is no longer available');
				return;
			}

			res.redirect(302, url);
		}
		catch (error) {
			LogEngine.error('Download link handling failed:', error instanceof Error ? error.message : String(error));
			res.status(502).send('File is temporarily unavailable');
		}
	}

	async function watch(req: Request, res: Response): Promise<void> {
		try {
			const record = await lookup(req);
			if (!record || !PLAYABLE_KINDS.has(record.fileHandleRef.mediaKind)) {
				res.status(404).send('Link not found or expired');
				return;
			}

			const { uniqueId, hash, name } = req.params;
			const downloadPath = `/dl/${uniqueId}/${hash}/${encodeURIComponent(name)}`;
			res.status(200).type('html').send(renderPlayerPage(record, downloadPath));
		}
		catch (error) {
			LogEngine.error('Watch page handling failed:', error instanceof Error ? error.message : String(error));
			res.status(500).send('Player unavailable');
		}
	}

	/**
	 * Returns basic operational status without exposing system details
	 */
	async function health(_req: Request, res: Response): Promise<void> {
		res.status(200).json({
			status: 'healthy',
			timestamp: new Date().toISOString(),
		});
	}

	return { download, watch, health };
}

function route(handler: AsyncHandler) {
	return (req: Request, res: Response, next: NextFunction): void => {
		handler(req, res).catch(next);
	};
}

export function createLinkServer(deps: LinkServerDependencies): express.Express {
	const handlers = createLinkHandlers(deps);
	const app = express();

	app.disable('x-powered-by');
	app.get('/health', route(handlers.health));
	app.get('/dl/:uniqueId/:hash/:name', route(handlers.download));
	app.get('/watch/:uniqueId/:hash/:name', route(handlers.watch));

	return app;
}

/**
 * Starts listening and routes socket errors (such as EADDRINUSE) to
 * `onFatal` instead of leaving them unhandled
 */
export function listenLinkServer(
	app: Pick<express.Express, 'listen'>,
	port: number,
	onFatal: (error: Error) => void,
): Server {
	const server = app.listen(port, () => {
		LogEngine.info(`Link server listening on port ${port}`);
	});

	server.on('error', (error: Error) => {
		LogEngine.error(`Link server failed on port ${port}:`, error.message);
		onFatal(error);
	});

	return server;
}
