/**
 * Record store SDK entry point
 *
 * @module sdk/record-store
 */

export type { RecordStore } from './RecordStore';
export { hashesMatch } from './RecordStore';
export { MemoryRecordStore } from './MemoryRecordStore';
export { PostgresRecordStore, createPostgresPool } from './PostgresRecordStore';
export { ResilientRecordStore } from './ResilientRecordStore';
