/**
 * Feedback Update Engine
 *
 * Applies a more/less/perfect judgement to the record that best matches
 * an ingredient for a user, then re-embeds and rewrites that record in
 * place under the same id.
 */

import { Result, ok, err, errorCause, errorMessage } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import {
	ServiceUnavailableError,
	TasteNotFoundError,
	TasteValidationError,
	TransientExternalError,
	dependencyFailure,
} from '../lib/errors/TasteStoreErrors.js';
import { isFeedback, type Feedback, type FeedbackOptions, type FeedbackUpdate } from '../models/feedback.js';
import type { Quantity, TasteRecord } from '../models/taste-record.js';
import type { EmbeddingFunction } from './embedding/adapter-interface.js';
import type { VectorIndex } from './vector-index/index-interface.js';
import type { RetrievalEngine } from './retrieval-engine.js';
import { isRejection, type TasteRecordCodec } from './taste-codec.js';
import { FEEDBACK_RULES, RETRIEVAL_DEFAULTS } from '../constants/taste-constants.js';

export type FeedbackError =
	| TasteValidationError
	| TasteNotFoundError
	| ServiceUnavailableError
	| TransientExternalError;

export class FeedbackEngine {
	constructor(
		private embedder: EmbeddingFunction,
		private retrieval: RetrievalEngine,
		private index: VectorIndex,
		private codec: TasteRecordCodec,
		private logger: Logger,
		private feedbackCandidates: number = RETRIEVAL_DEFAULTS.FEEDBACK_CANDIDATES
	) {}

	/**
	 * Apply feedback to the user's best-matching record
	 *
	 * The target is found by embedding the ingredient name alone and
	 * taking the candidate with the highest feedback weight. Without
	 * `exactMatch` a near-duplicate of a different ingredient can win.
	 */
	async applyFeedback(
		userId: string,
		ingredient: string,
		cuisine: string,
		feedback: string,
		options: FeedbackOptions = {}
	): Promise<Result<FeedbackUpdate, FeedbackError>> {
		if (!isFeedback(feedback)) {
			return err(
				new TasteValidationError(`Invalid feedback "${feedback}". Expected one of: more, less, perfect`, 'feedback')
			);
		}
		for (const [field, value] of [
			['userId', userId],
			['ingredient', ingredient],
			['cuisine', cuisine],
		] as const) {
			if (value.trim() === '') {
				return err(new TasteValidationError(`${field} is required`, field));
			}
		}

		try {
			return await this.update(userId, ingredient, cuisine, feedback, options);
		} catch (error) {
			return err(new TransientExternalError('feedback update', errorMessage(error), errorCause(error)));
		}
	}

	private async update(
		userId: string,
		ingredient: string,
		cuisine: string,
		feedback: Feedback,
		options: FeedbackOptions
	): Promise<Result<FeedbackUpdate, FeedbackError>> {
		const probe = await this.embedder.embed(ingredient);
		if (probe.isErr()) {
			return err(dependencyFailure('embedding model', 'embed feedback probe', probe.error));
		}

		const candidates = await this.retrieval.find(probe.value, userId, {
			topK: this.feedbackCandidates,
			ranking: 'confidence',
			filter: options.exactMatch ? { ingredient, cuisine } : undefined,
			namespace: options.namespace,
		});
		if (candidates.isErr()) {
			return err(candidates.error);
		}

		const target = candidates.value[0];
		if (!target) {
			return err(new TasteNotFoundError(userId, ingredient, options.exactMatch ? `cuisine '${cuisine}'` : undefined));
		}

		const previous = target.record;
		const amount = adjustAmount(previous.amount, feedback);
		if (amount.isErr()) {
			return err(amount.error);
		}

		const feedbackWeight =
			feedback === 'perfect'
				? previous.feedbackWeight + FEEDBACK_RULES.PERFECT_WEIGHT_INCREMENT
				: previous.feedbackWeight;

		const encoded = await this.codec.encode({
			id: previous.id,
			user_id: userId,
			ingredient,
			amount: amount.value,
			unit: previous.unit,
			servings: previous.servings,
			cuisine,
			feedback_weight: feedbackWeight,
		});
		if (encoded.isErr()) {
			if (isRejection(encoded.error)) {
				return err(
					new TasteValidationError(
						`Stored record ${previous.id} is missing ${encoded.error.missingFields.join(', ')}`,
						encoded.error.missingFields[0]
					)
				);
			}
			return err(dependencyFailure('embedding model', 'embed updated record', encoded.error));
		}

		const entry = encoded.value;
		const written = await this.index.upsert(
			[{ id: entry.id, vector: entry.vector, metadata: entry.metadata }],
			options.namespace
		);
		if (written.isErr()) {
			this.logger.logIndexError('upsert', written.error, {
				namespace: options.namespace,
				additionalContext: { id: entry.id, feedback },
			});
			return err(dependencyFailure('vector index', 'upsert', written.error));
		}
		if (written.value === 0) {
			return err(new TransientExternalError('upsert', `index reported no write for record ${entry.id}`));
		}

		const record: TasteRecord = this.codec.decode(entry);
		this.logger.info('Applied feedback', {
			id: entry.id,
			userId,
			feedback,
			amount: { from: previous.amount, to: record.amount },
			feedbackWeight: { from: previous.feedbackWeight, to: record.feedbackWeight },
		});

		return ok({ id: entry.id, feedback, record, previous });
	}
}

/**
 * New amount for a feedback kind
 *
 * more/less scale the amount and need it numeric and positive. The
 * result is not rounded (100 * 1.1 is stored as 110.00000000000001),
 * and more then less lands on 99, not 100. Only rendered text rounds.
 */
export function adjustAmount(amount: Quantity, feedback: Feedback): Result<Quantity, TasteValidationError> {
	if (feedback === 'perfect') {
		return ok(amount);
	}

	if (typeof amount !== 'number' || amount <= 0) {
		return err(
			new TasteValidationError(`Cannot apply "${feedback}" to non-positive or non-numeric amount "${amount}"`, 'amount')
		);
	}

	const factor = feedback === 'more' ? FEEDBACK_RULES.MORE_FACTOR : FEEDBACK_RULES.LESS_FACTOR;
	return ok(amount * factor);
}
