/**
 * In-memory vector index
 *
 * Brute-force cosine similarity over a per-namespace map. For tests and
 * one-shot CLI runs (TASTE_INDEX=memory); nothing is persisted.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import type { IndexEntry, IndexMatch, IndexQuery } from '../../models/vector-index.js';
import { flattenFilter, matchesConditions } from './metadata-filter.js';
import { VectorIndex, VectorIndexError, VectorIndexUnavailableError } from './index-interface.js';

/**
 * Cosine similarity of two equal-length vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
	const n = Math.min(a.length, b.length);
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < n; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) return 0;
	return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface InMemoryVectorIndexOptions {
	/** Expected vector length; when omitted the first write fixes it */
	dimensions?: number;
}

export class InMemoryVectorIndex implements VectorIndex {
	readonly name = 'memory';

	private namespaces = new Map<string, Map<string, IndexEntry>>();
	private closed = false;
	private dimensions?: number;

	constructor(options: InMemoryVectorIndexOptions = {}) {
		this.dimensions = options.dimensions;
	}

	async upsert(entries: IndexEntry[], namespace: string = ''): Promise<Result<number, VectorIndexError>> {
		if (this.closed) {
			return err(new VectorIndexUnavailableError('Vector index is closed'));
		}

		for (const entry of entries) {
			const dims = this.checkDimensions(entry.vector, `entry ${entry.id}`);
			if (dims.isErr()) {
				return err(dims.error);
			}
		}

		const store = this.namespaceStore(namespace);
		for (const entry of entries) {
			store.set(entry.id, {
				id: entry.id,
				vector: [...entry.vector],
				metadata: { ...entry.metadata },
			});
		}
		return ok(entries.length);
	}

	async query(query: IndexQuery): Promise<Result<IndexMatch[], VectorIndexError>> {
		if (this.closed) {
			return err(new VectorIndexUnavailableError('Vector index is closed'));
		}

		const dims = this.checkDimensions(query.vector, 'query vector');
		if (dims.isErr()) {
			return err(dims.error);
		}

		const conditions = flattenFilter(query.filter);
		if (conditions.isErr()) {
			return err(new VectorIndexError(conditions.error.message));
		}

		const store = this.namespaces.get(query.namespace ?? '');
		if (!store) {
			return ok([]);
		}

		const matches: IndexMatch[] = [];
		for (const entry of store.values()) {
			if (!matchesConditions(entry.metadata, conditions.value)) continue;
			matches.push({
				id: entry.id,
				score: cosineSimilarity(query.vector, entry.vector),
				metadata: { ...entry.metadata },
			});
		}

		return ok(matches.sort((a, b) => b.score - a.score).slice(0, Math.max(0, query.topK)));
	}

	async fetch(id: string, namespace: string = ''): Promise<Result<IndexEntry | null, VectorIndexError>> {
		if (this.closed) {
			return err(new VectorIndexUnavailableError('Vector index is closed'));
		}

		const entry = this.namespaces.get(namespace)?.get(id);
		return ok(entry ? { id: entry.id, vector: [...entry.vector], metadata: { ...entry.metadata } } : null);
	}

	async count(namespace: string = ''): Promise<Result<number, VectorIndexError>> {
		if (this.closed) {
			return err(new VectorIndexUnavailableError('Vector index is closed'));
		}
		return ok(this.namespaces.get(namespace)?.size ?? 0);
	}

	close(): void {
		this.closed = true;
	}

	private checkDimensions(vector: number[], label: string): Result<void, VectorIndexError> {
		if (this.dimensions === undefined) {
			this.dimensions = vector.length;
			return ok(undefined);
		}
		if (vector.length !== this.dimensions) {
			return err(
				new VectorIndexError(
					`Vector dimension mismatch for ${label}: expected ${this.dimensions}, got ${vector.length}`
				)
			);
		}
		return ok(undefined);
	}

	private namespaceStore(namespace: string): Map<string, IndexEntry> {
		let store = this.namespaces.get(namespace);
		if (!store) {
			store = new Map();
			this.namespaces.set(namespace, store);
		}
		return store;
	}
}
