/**
 * PostgreSQL Record Store - Durable Transfer Records
 *
 * Keeps TransferRecords in the `transfer_records` table for 30 days. Expired
 * rows stay physically present until sweepExpired() deletes them, but lookups
 * filter them out, so an expired record is never returned.
 *
 * 🐛 TROUBLESHOOTING:
 * ==================
 * - Every put failing with `unavailable`? Check POSTGRES_URL and SSL settings
 * - Table missing? initialize() applies sql/schema.sql at startup
 * - Frequent `conflict` errors? Many uploads within the same millisecond window
 *
 * @module sdk/record-store/PostgresRecordStore
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Pool, PoolConfig } from 'pg';
import { LogEngine } from '../../config/logger';
import { DEFAULT_CONFIG, getSSLConfig, processConnectionString } from '../../config/defaults';
import { RecordStoreError } from '../../types/errors';
import { MediaKind, RecordStats, TransferRecord, TransferRecordDraft } from '../../types/transfer';
import { RecordStore, hashesMatch, withRetention } from './RecordStore';

// Resolves from both src/ and dist/
const SCHEMA_PATH = path.resolve(__dirname, '../../../sql/schema.sql');

interface TransferRecordRow {
	unique_id: number;
	integrity_hash: string;
	platform_file_id: string;
	platform_file_unique_id: string;
	display_name: string;
	size_bytes: string | number;
	media_kind: string;
	created_at: Date;
	expires_at: Date;
}

interface StatsRow {
	total: number;
	active: number;
	total_size: string | number;
}

function toMediaKind(value: string): MediaKind {
	return Object.values(MediaKind).find(kind => kind === value) ?? MediaKind.Document;
}

function rowToRecord(row: TransferRecordRow): TransferRecord {
	return {
		uniqueId: row.unique_id,
		integrityHash: row.integrity_hash,
		fileHandleRef: {
			platformFileId: row.platform_file_id,
			platformFileUniqueId: row.platform_file_unique_id,
			displayName: row.display_name,
			sizeBytes: Number(row.size_bytes),
			mediaKind: toMediaKind(row.media_kind),
		},
		createdAt: row.created_at,
		expiresAt: row.expires_at,
	};
}

export interface PostgresRecordStoreOptions {
	retentionMs?: number;
	now?: () => number;
}

/**
 * Creates a connection pool with the SSL policy from config/defaults;
 * certificates are validated when `nodeEnv` is production
 */
export function createPostgresPool(postgresUrl: string, nodeEnv: string): Pool {
	const isProduction = nodeEnv === 'production';
	const sslConfig = getSSLConfig(isProduction);

	const poolConfig: PoolConfig = {
		connectionString: processConnectionString(postgresUrl, sslConfig),
		max: 10,
		idleTimeoutMillis: 30000,
		connectionTimeoutMillis: 5000,
	};

	if (sslConfig !== false) {
		poolConfig.ssl = sslConfig;
	}

	const pool = new Pool(poolConfig);
	pool.on('error', (error: Error) => {
		LogEngine.error('PostgreSQL pool error:', error.message);
	});
	return pool;
}

export class PostgresRecordStore implements RecordStore {
	private readonly retentionMs: number;
	private readonly now: () => number;

	constructor(private readonly pool: Pool, options: PostgresRecordStoreOptions = {}) {
		this.retentionMs = options.retentionMs ?? DEFAULT_CONFIG.DURABLE_RETENTION_MS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Applies the table schema; safe to run on every startup
	 */
	async initialize(): Promise<void> {
		const schema = await fs.readFile(SCHEMA_PATH, 'utf8');
		await this.pool.query(schema);
		LogEngine.info('PostgreSQL record store schema ready');
	}

	async put(draft: TransferRecordDraft): Promise<TransferRecord> {
		const record = withRetention(draft, this.retentionMs);
		const ref = record.fileHandleRef;

		let rowCount: number | null;
		try {
			// An expired row may be taken over; a live one may not
			const result = await this.pool.query(
				`INSERT INTO transfer_records
					(unique_id, integrity_hash, platform_file_id, platform_file_unique_id,
					 display_name, size_bytes, media_kind, created_at, expires_at)
				VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
				ON CONFLICT (unique_id) DO UPDATE SET
					integrity_hash = EXCLUDED.integrity_hash,
					platform_file_id = EXCLUDED.platform_file_id,
					platform_file_unique_id = EXCLUDED.platform_file_unique_id,
					display_name = EXCLUDED.display_name,
					size_bytes = EXCLUDED.size_bytes,
					media_kind = EXCLUDED.media_kind,
					created_at = EXCLUDED.created_at,
					expires_at = EXCLUDED.expires_at
				WHERE transfer_records.expires_at <= $10`,
				[
					record.uniqueId,
					record.integrityHash,
					ref.platformFileId,
					ref.platformFileUniqueId,
					ref.displayName,
					ref.sizeBytes,
					ref.mediaKind,
					record.createdAt,
					record.expiresAt,
					new Date(this.now()),
				],
			);
			rowCount = result.rowCount;
		}
		catch (error) {
			throw new RecordStoreError('unavailable', `Failed to store record ${record.uniqueId}`, { cause: error });
		}

		if (!rowCount) {
			throw new RecordStoreError('conflict', `Record ${record.uniqueId} is already in use`);
		}

		LogEngine.debug(`Stored durable record ${record.uniqueId} until ${record.expiresAt.toISOString()}`);
		return record;
	}

	async get(uniqueId: number, integrityHash: string): Promise<TransferRecord | null> {
		const result = await this.pool.query<TransferRecordRow>(
			'SELECT * FROM transfer_records WHERE unique_id = $1 AND expires_at > $2',
			[uniqueId, new Date(this.now())],
		);

		const row = result.rows.length > 0 ? result.rows[0] : undefined;
		if (!hashesMatch(row?.integrity_hash, integrityHash) || !row) {
			return null;
		}
		return rowToRecord(row);
	}

	async sweepExpired(): Promise<number> {
		const result = await this.pool.query(
			'DELETE FROM transfer_records WHERE expires_at < $1',
			[new Date(this.now())],
		);
		const removed = result.rowCount ?? 0;
		LogEngine.info(`Cleaned up ${removed} expired durable record(s)`);
		return removed;
	}

	async stats(): Promise<RecordStats> {
		const result = await this.pool.query<StatsRow>(
			`SELECT
				COUNT(*)::int AS total,
				(COUNT(*) FILTER (WHERE expires_at > $1))::int AS active,
				COALESCE(SUM(size_bytes), 0)::text AS total_size
			FROM transfer_records`,
			[new Date(this.now())],
		);
		const row = result.rows[0];
		return {
			total: row ? Number(row.total) : 0,
			active: row ? Number(row.active) : 0,
			totalSizeBytes: row ? Number(row.total_size) : 0,
		};
	}

}
