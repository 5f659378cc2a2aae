/**
 * SQLite Vector Index
 *
 * Stores taste vectors in a regular SQLite table and ranks them with the
 * sqlite-vec extension's cosine distance. Metadata lives in a JSON column
 * so filters can match any field through json_extract.
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import * as fs from 'fs';
import * as path from 'path';
import { Result, ok, err, errorCause, errorMessage } from '../../lib/result-types.js';
import type { IndexEntry, IndexMatch, IndexQuery, Metadata } from '../../models/vector-index.js';
import { flattenFilter } from './metadata-filter.js';
import { VectorIndex, VectorIndexError, VectorIndexUnavailableError } from './index-interface.js';

/** SQLite result codes worth retrying */
const BUSY_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED_SHAREDCACHE'];

interface VectorRow {
	id: string;
	embedding: Buffer;
	metadata: string;
}

interface ScoredRow {
	id: string;
	metadata: string;
	score: number;
}

export interface SqliteVecIndexOptions {
	/** Expected vector length; writes and queries of other lengths are rejected */
	dimensions: number;
}

/**
 * SQLite + sqlite-vec implementation of VectorIndex
 */
export class SqliteVecIndex implements VectorIndex {
	readonly name = 'sqlite-vec';

	private closed = false;

	constructor(
		private db: Database.Database,
		private options: SqliteVecIndexOptions
	) {
		this.loadExtension();
		this.initializeTable();
	}

	/**
	 * Open (or create) an index database file
	 *
	 * ':memory:' opens a private in-memory database.
	 */
	static open(dbPath: string, options: SqliteVecIndexOptions): Result<SqliteVecIndex, VectorIndexError> {
		try {
			if (dbPath !== ':memory:') {
				fs.mkdirSync(path.dirname(dbPath), { recursive: true });
			}

			const db = new Database(dbPath);
			db.pragma('journal_mode = WAL');
			db.pragma('synchronous = NORMAL');

			return ok(new SqliteVecIndex(db, options));
		} catch (error) {
			if (error instanceof VectorIndexError) {
				return err(error);
			}
			return err(
				new VectorIndexUnavailableError(
					`Failed to open vector index at ${dbPath}: ${errorMessage(error)}`,
					errorCause(error)
				)
			);
		}
	}

	/**
	 * Load sqlite-vec extension
	 */
	private loadExtension(): void {
		try {
			sqliteVec.load(this.db);
			this.db.prepare('SELECT vec_version() AS vec_version').get();
		} catch (error) {
			throw new VectorIndexUnavailableError(
				`Failed to load sqlite-vec extension: ${errorMessage(error)}`,
				errorCause(error)
			);
		}
	}

	/**
	 * Create the vectors table
	 */
	private initializeTable(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS taste_vectors (
				namespace TEXT NOT NULL,
				id TEXT NOT NULL,
				embedding BLOB NOT NULL,
				metadata TEXT NOT NULL,
				updated_at TEXT NOT NULL DEFAULT (datetime('now')),
				PRIMARY KEY (namespace, id)
			);
		`);
	}

	async upsert(entries: IndexEntry[], namespace: string = ''): Promise<Result<number, VectorIndexError>> {
		const open = this.ensureOpen();
		if (open.isErr()) {
			return err(open.error);
		}

		for (const entry of entries) {
			const dims = this.checkDimensions(entry.vector, `entry ${entry.id}`);
			if (dims.isErr()) {
				return err(dims.error);
			}
		}

		try {
			const stmt = this.db.prepare(`
				INSERT INTO taste_vectors (namespace, id, embedding, metadata, updated_at)
				VALUES (?, ?, ?, ?, datetime('now'))
				ON CONFLICT (namespace, id) DO UPDATE SET
					embedding = excluded.embedding,
					metadata = excluded.metadata,
					updated_at = excluded.updated_at
			`);

			const writeAll = this.db.transaction((batch: IndexEntry[]) => {
				let written = 0;
				for (const entry of batch) {
					written += stmt.run(namespace, entry.id, toBlob(entry.vector), JSON.stringify(entry.metadata)).changes;
				}
				return written;
			});

			return ok(writeAll(entries));
		} catch (error) {
			return err(this.wrapError('upsert', error));
		}
	}

	async query(query: IndexQuery): Promise<Result<IndexMatch[], VectorIndexError>> {
		const open = this.ensureOpen();
		if (open.isErr()) {
			return err(open.error);
		}

		const dims = this.checkDimensions(query.vector, 'query vector');
		if (dims.isErr()) {
			return err(dims.error);
		}

		const conditions = flattenFilter(query.filter);
		if (conditions.isErr()) {
			return err(new VectorIndexError(conditions.error.message));
		}

		const where = ['namespace = ?'];
		const params: unknown[] = [toBlob(query.vector), query.namespace ?? ''];
		for (const { field, value } of conditions.value) {
			where.push(`json_extract(metadata, '$.${field}') = ?`);
			params.push(typeof value === 'boolean' ? (value ? 1 : 0) : value);
		}
		params.push(query.topK);

		try {
			const rows = this.db
				.prepare<unknown[], ScoredRow>(`
					SELECT
						id,
						metadata,
						(1 - vec_distance_cosine(embedding, ?)) AS score
					FROM taste_vectors
					WHERE ${where.join(' AND ')}
					ORDER BY score DESC
					LIMIT ?
				`)
				.all(...params);

			return ok(
				rows.map((row) => ({
					id: row.id,
					score: row.score,
					metadata: parseMetadata(row.metadata),
				}))
			);
		} catch (error) {
			return err(this.wrapError('query', error));
		}
	}

	async fetch(id: string, namespace: string = ''): Promise<Result<IndexEntry | null, VectorIndexError>> {
		const open = this.ensureOpen();
		if (open.isErr()) {
			return err(open.error);
		}

		try {
			const row = this.db
				.prepare<[string, string], VectorRow>(
					'SELECT id, embedding, metadata FROM taste_vectors WHERE namespace = ? AND id = ?'
				)
				.get(namespace, id);

			if (!row) {
				return ok(null);
			}

			return ok({
				id: row.id,
				vector: fromBlob(row.embedding),
				metadata: parseMetadata(row.metadata),
			});
		} catch (error) {
			return err(this.wrapError('fetch', error));
		}
	}

	async count(namespace: string = ''): Promise<Result<number, VectorIndexError>> {
		const open = this.ensureOpen();
		if (open.isErr()) {
			return err(open.error);
		}

		try {
			const row = this.db
				.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM taste_vectors WHERE namespace = ?')
				.get(namespace);
			return ok(row?.count ?? 0);
		} catch (error) {
			return err(this.wrapError('count', error));
		}
	}

	close(): void {
		if (!this.closed) {
			this.db.close();
			this.closed = true;
		}
	}

	private ensureOpen(): Result<void, VectorIndexError> {
		if (this.closed) {
			return err(new VectorIndexUnavailableError('Vector index is closed'));
		}
		return ok(undefined);
	}

	private checkDimensions(vector: number[], label: string): Result<void, VectorIndexError> {
		if (vector.length !== this.options.dimensions) {
			return err(
				new VectorIndexError(
					`Vector dimension mismatch for ${label}: expected ${this.options.dimensions}, got ${vector.length}`
				)
			);
		}
		return ok(undefined);
	}

	private wrapError(operation: string, error: unknown): VectorIndexError {
		const message = `Failed to ${operation} vectors: ${errorMessage(error)}`;
		return new VectorIndexError(message, isBusyError(error), errorCause(error));
	}
}

function isBusyError(error: unknown): boolean {
	return (
		typeof error === 'object' &&
		error !== null &&
		'code' in error &&
		typeof error.code === 'string' &&
		BUSY_CODES.includes(error.code)
	);
}

function toBlob(vector: number[]): Buffer {
	const f32 = new Float32Array(vector);
	return Buffer.from(f32.buffer, f32.byteOffset, f32.byteLength);
}

function fromBlob(blob: Buffer): number[] {
	// Copy first: the blob's byteOffset need not be 4-byte aligned
	return Array.from(new Float32Array(Uint8Array.from(blob).buffer));
}

/**
 * Parse a stored metadata column, keeping only scalar values
 */
export function parseMetadata(text: string): Metadata {
	const parsed: unknown = JSON.parse(text);
	const metadata: Metadata = {};
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		return metadata;
	}

	for (const [key, value] of Object.entries(parsed)) {
		if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			metadata[key] = value;
		}
	}
	return metadata;
}
