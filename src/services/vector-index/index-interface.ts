/**
 * Vector Index Interface
 *
 * Contract for the k-NN index the taste store sits on: upsert by id,
 * similarity query under a metadata filter, fetch by id.
 */

import type { Result } from '../../lib/result-types.js';
import type { IndexEntry, IndexMatch, IndexQuery } from '../../models/vector-index.js';

/**
 * Vector index error
 */
export class VectorIndexError extends Error {
	constructor(
		message: string,
		public readonly retryable: boolean = false,
		public override cause?: Error
	) {
		super(message);
		this.name = 'VectorIndexError';
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * Index not opened, closed, or failed to initialize (non-retryable)
 */
export class VectorIndexUnavailableError extends VectorIndexError {
	constructor(message: string, cause?: Error) {
		super(message, false, cause);
		this.name = 'VectorIndexUnavailableError';
	}
}

/**
 * Vector index contract
 */
export interface VectorIndex {
	/** Adapter name for logs (e.g., "sqlite-vec") */
	readonly name: string;

	/**
	 * Insert or replace entries by id
	 *
	 * @returns Number of entries written
	 */
	upsert(entries: IndexEntry[], namespace?: string): Promise<Result<number, VectorIndexError>>;

	/**
	 * Nearest neighbours of a vector among entries matching the filter,
	 * most similar first
	 */
	query(query: IndexQuery): Promise<Result<IndexMatch[], VectorIndexError>>;

	/**
	 * Entry by id, or null when absent
	 */
	fetch(id: string, namespace?: string): Promise<Result<IndexEntry | null, VectorIndexError>>;

	/**
	 * Number of entries in a namespace
	 */
	count(namespace?: string): Promise<Result<number, VectorIndexError>>;

	close(): void;
}
