/**
 * Taste Service
 *
 * The query interface other services call: prompt snippets for
 * ingredients, feedback, and index maintenance. Requests are validated
 * with zod; every outcome is a Result.
 */

import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import {
	ServiceUnavailableError,
	TasteValidationError,
	dependencyFailure,
	describeError,
	type TasteOperationError,
} from '../lib/errors/TasteStoreErrors.js';
import {
	FeedbackRequestSchema,
	SearchRequestSchema,
	formatIssues,
	type SearchItem,
	type SearchResponse,
	type SearchStatus,
} from '../models/requests.js';
import type { FeedbackOptions, FeedbackUpdate } from '../models/feedback.js';
import type { ChangeEvent, ChangeEventOutcome, IngestionReport } from '../models/change-event.js';
import type { RawTasteFields } from '../models/taste-record.js';
import type { EmbeddingFunction } from './embedding/adapter-interface.js';
import type { VectorIndex } from './vector-index/index-interface.js';
import type { RetrievalEngine } from './retrieval-engine.js';
import type { FeedbackEngine } from './feedback-engine.js';
import type { IngestionService } from './ingestion-service.js';
import type { PromptFormatter } from './prompt-formatter.js';

export interface TasteServiceSettings {
	namespace: string;
	minScore: number;
	topK: number;
}

export interface TasteServiceDeps {
	embedder: EmbeddingFunction;
	index: VectorIndex;
	retrieval: RetrievalEngine;
	feedback: FeedbackEngine;
	ingestion: IngestionService;
	formatter: PromptFormatter;
	logger: Logger;
}

/**
 * Text embedded to probe for an ingredient preference
 */
export function searchQueryText(ingredient: string, cuisine: string): string {
	return `${ingredient} ${cuisine} cuisine taste`;
}

export class TasteService {
	constructor(
		private deps: TasteServiceDeps,
		private settings: TasteServiceSettings
	) {}

	/**
	 * Prompt sentence for one ingredient, scaled to the requested servings
	 */
	async search(
		userId: string,
		ingredient: string,
		cuisine: string,
		requestedServings: number
	): Promise<Result<string, TasteOperationError>> {
		const parsed = SearchRequestSchema.safeParse({
			userId,
			cuisine,
			ingredients: [ingredient],
			servings: requestedServings,
		});
		if (!parsed.success) {
			return err(new TasteValidationError(formatIssues(parsed.error)));
		}

		const request = parsed.data;
		return this.searchOne(request.userId, ingredient, request.cuisine, request.servings);
	}

	/**
	 * Prompt sentences for several ingredients
	 *
	 * Ingredients are looked up concurrently. Items come back in request
	 * order; a failed ingredient becomes an error item in its slot.
	 */
	async searchMany(request: unknown): Promise<Result<SearchResponse, TasteValidationError>> {
		const parsed = SearchRequestSchema.safeParse(request);
		if (!parsed.success) {
			return err(new TasteValidationError(formatIssues(parsed.error)));
		}

		const { userId, cuisine, ingredients, servings } = parsed.data;
		const items: SearchItem[] = await Promise.all(
			ingredients.map(async (ingredient): Promise<SearchItem> => {
				try {
					const prompt = await this.searchOne(userId, ingredient, cuisine, servings);
					return prompt.isOk()
						? { ingredient, prompt: prompt.value }
						: { ingredient, error: describeError(prompt.error) };
				} catch (error) {
					return { ingredient, error: describeError(error) };
				}
			})
		);

		const errors = items.flatMap((item) => ('error' in item ? [`${item.ingredient}: ${item.error}`] : []));
		for (const message of errors) {
			this.deps.logger.warn('Ingredient search failed', { userId, error: message });
		}

		return ok({ userId, cuisine, servings, items, errors, status: searchStatus(items.length, errors.length) });
	}

	/**
	 * Apply more/less/perfect feedback to the user's matching record
	 */
	async feedback(
		userId: string,
		ingredient: string,
		cuisine: string,
		feedback: string,
		options: Omit<FeedbackOptions, 'namespace'> = {}
	): Promise<Result<FeedbackUpdate, TasteOperationError>> {
		const parsed = FeedbackRequestSchema.safeParse({ userId, ingredient, cuisine, feedback });
		if (!parsed.success) {
			return err(new TasteValidationError(formatIssues(parsed.error)));
		}

		const request = parsed.data;
		return this.deps.feedback.applyFeedback(request.userId, request.ingredient, request.cuisine, request.feedback, {
			...options,
			namespace: this.settings.namespace,
		});
	}

	async ingest(
		documents: RawTasteFields[],
		batchSize?: number
	): Promise<Result<IngestionReport, ServiceUnavailableError>> {
		return this.deps.ingestion.ingest(documents, { namespace: this.settings.namespace, batchSize });
	}

	async applyChange(event: ChangeEvent): Promise<Result<ChangeEventOutcome, TasteOperationError>> {
		return this.deps.ingestion.applyChange(event, this.settings.namespace);
	}

	/**
	 * Number of records in the configured namespace
	 */
	async count(): Promise<Result<number, TasteOperationError>> {
		const result = await this.deps.index.count(this.settings.namespace);
		if (result.isErr()) {
			return err(dependencyFailure('vector index', 'count', result.error));
		}
		return ok(result.value);
	}

	async close(): Promise<void> {
		this.deps.index.close();
		await this.deps.embedder.dispose();
	}

	private async searchOne(
		userId: string,
		ingredient: string,
		cuisine: string,
		servings: number
	): Promise<Result<string, TasteOperationError>> {
		const name = ingredient.trim();
		if (name === '') {
			return err(new TasteValidationError('ingredient is required', 'ingredient'));
		}

		const vector = await this.deps.embedder.embed(searchQueryText(name, cuisine));
		if (vector.isErr()) {
			return err(dependencyFailure('embedding model', 'embed search query', vector.error));
		}

		const matches = await this.deps.retrieval.find(vector.value, userId, {
			ingredient: name,
			minScore: this.settings.minScore,
			topK: this.settings.topK,
			ranking: 'similarity',
			namespace: this.settings.namespace,
		});
		if (matches.isErr()) {
			return err(matches.error);
		}

		return ok(this.deps.formatter.format(matches.value[0], name, servings));
	}
}

function searchStatus(total: number, failed: number): SearchStatus {
	if (failed === 0) return 'success';
	if (failed < total) return 'partial_success';
	return 'failure';
}
