/**
 * Retrieval Engine
 *
 * Scoped similarity search over a user's taste records: one k-NN query
 * under a user (and optionally ingredient) filter, a score threshold
 * applied here rather than trusted to the index, then ranking.
 */

import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import { ServiceUnavailableError, TasteValidationError } from '../lib/errors/TasteStoreErrors.js';
import type { MetadataFilter } from '../models/vector-index.js';
import type { TasteMatch } from '../models/taste-record.js';
import type { VectorIndex } from './vector-index/index-interface.js';
import { andFilters, flattenFilter } from './vector-index/metadata-filter.js';
import type { TasteRecordCodec } from './taste-codec.js';
import { RETRIEVAL_DEFAULTS } from '../constants/taste-constants.js';

/**
 * Ordering of returned matches
 *
 * - similarity: descending score (display and prompt augmentation)
 * - confidence: descending feedback weight, ties in index order (update lookup)
 */
export type RankingMode = 'similarity' | 'confidence';

export interface FindOptions {
	/** Exact-match ingredient filter */
	ingredient?: string;

	/** Drop hits scoring below this; no threshold when omitted */
	minScore?: number;

	topK: number;

	/** Extra filter conjoined with the user filter */
	filter?: MetadataFilter;

	ranking?: RankingMode;

	namespace?: string;
}

export class RetrievalEngine {
	constructor(
		private index: VectorIndex,
		private codec: TasteRecordCodec,
		private logger: Logger,
		private slowQueryThresholdMs: number = RETRIEVAL_DEFAULTS.SLOW_QUERY_THRESHOLD_MS
	) {}

	/**
	 * Find a user's records nearest to a query vector
	 *
	 * A retryable index failure yields an empty list; it is logged, not
	 * raised.
	 */
	async find(
		queryVector: number[],
		userId: string,
		options: FindOptions
	): Promise<Result<TasteMatch[], TasteValidationError | ServiceUnavailableError>> {
		const validation = this.validate(queryVector, userId, options);
		if (validation.isErr()) {
			return err(validation.error);
		}

		const filter = andFilters(
			{ user_id: userId },
			options.ingredient !== undefined ? { ingredient: options.ingredient } : undefined,
			options.filter
		);

		const start = performance.now();
		const result = await this.index.query({
			vector: queryVector,
			topK: options.topK,
			filter,
			namespace: options.namespace,
		});
		const duration = performance.now() - start;

		if (result.isErr()) {
			this.logger.logIndexError('query', result.error, {
				namespace: options.namespace,
				additionalContext: { userId, ingredient: options.ingredient, retryable: result.error.retryable },
			});

			if (result.error.retryable) {
				return ok([]);
			}
			return err(new ServiceUnavailableError('vector index', result.error.message, result.error));
		}

		if (duration > this.slowQueryThresholdMs) {
			this.logger.logSlowQuery('find', duration, this.slowQueryThresholdMs, {
				resultCount: result.value.length,
				additionalContext: { userId, ingredient: options.ingredient, index: this.index.name },
			});
		}

		const minScore = options.minScore;
		const matches: TasteMatch[] = result.value
			.filter((hit) => minScore === undefined || hit.score >= minScore)
			.map((hit) => ({ record: this.codec.decode(hit), score: hit.score }));

		return ok(rank(matches, options.ranking ?? 'similarity'));
	}

	private validate(
		queryVector: number[],
		userId: string,
		options: FindOptions
	): Result<void, TasteValidationError> {
		if (queryVector.length === 0 || !queryVector.every((v) => Number.isFinite(v))) {
			return err(new TasteValidationError('Query vector must be a non-empty list of finite numbers', 'queryVector'));
		}
		if (userId.trim() === '') {
			return err(new TasteValidationError('User id is required', 'userId'));
		}
		if (!Number.isInteger(options.topK) || options.topK <= 0) {
			return err(new TasteValidationError(`topK must be a positive integer, got: ${options.topK}`, 'topK'));
		}
		if (options.minScore !== undefined && !Number.isFinite(options.minScore)) {
			return err(new TasteValidationError(`minScore must be a finite number, got: ${options.minScore}`, 'minScore'));
		}
		if (options.filter) {
			const flattened = flattenFilter(options.filter);
			if (flattened.isErr()) {
				return err(new TasteValidationError(flattened.error.message, 'filter'));
			}
		}
		return ok(undefined);
	}
}

/**
 * Sort matches for the given mode; Array.prototype.sort is stable
 */
export function rank(matches: TasteMatch[], mode: RankingMode): TasteMatch[] {
	const sorted = [...matches];
	if (mode === 'confidence') {
		return sorted.sort((a, b) => b.record.feedbackWeight - a.record.feedbackWeight);
	}
	return sorted.sort((a, b) => b.score - a.score);
}
