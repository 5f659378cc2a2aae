/**
 * Taste Service Factory
 *
 * Builds one service graph from configuration. Collaborators can be
 * swapped (an embedding function, an index, a document lookup) for tests
 * or embedding in another service.
 */

import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import type { TasteStoreConfig } from '../lib/env-config.js';
import { ServiceUnavailableError } from '../lib/errors/TasteStoreErrors.js';
import type { DocumentLookup } from '../models/change-event.js';
import type { EmbeddingFunction } from './embedding/adapter-interface.js';
import { HostedEmbeddingAdapter } from './embedding/hosted-adapter.js';
import type { VectorIndex } from './vector-index/index-interface.js';
import { InMemoryVectorIndex } from './vector-index/in-memory-index.js';
import { SqliteVecIndex } from './vector-index/sqlite-vec-index.js';
import { TasteRecordCodec } from './taste-codec.js';
import { RetrievalEngine } from './retrieval-engine.js';
import { FeedbackEngine } from './feedback-engine.js';
import { IngestionService } from './ingestion-service.js';
import { PromptFormatter } from './prompt-formatter.js';
import { TasteService } from './taste-service.js';

export interface TasteServiceOverrides {
	embedder?: EmbeddingFunction;
	index?: VectorIndex;
	lookup?: DocumentLookup;
}

/**
 * Open the configured index
 */
export function openIndex(config: TasteStoreConfig): Result<VectorIndex, ServiceUnavailableError> {
	if (config.index.backend === 'memory') {
		return ok(new InMemoryVectorIndex({ dimensions: config.embedding.dimensions }));
	}

	const opened = SqliteVecIndex.open(config.index.dbPath, { dimensions: config.embedding.dimensions });
	if (opened.isErr()) {
		return err(new ServiceUnavailableError('vector index', opened.error.message, opened.error));
	}
	return ok(opened.value);
}

/**
 * Create a ready-to-use TasteService
 *
 * Initializes the embedding function (unless already ready) and opens the
 * index. Either failing is a ServiceUnavailableError.
 */
export async function createTasteService(
	config: TasteStoreConfig,
	logger: Logger,
	overrides: TasteServiceOverrides = {}
): Promise<Result<TasteService, ServiceUnavailableError>> {
	const embedder = overrides.embedder ?? new HostedEmbeddingAdapter(config.embedding);
	if (!embedder.isReady()) {
		const initialized = await embedder.initialize();
		if (initialized.isErr()) {
			logger.error('Embedding function failed to initialize', {
				embedder: embedder.id,
				error: initialized.error.message,
			});
			return err(new ServiceUnavailableError('embedding model', initialized.error.message, initialized.error));
		}
	}

	let index: VectorIndex;
	if (overrides.index) {
		index = overrides.index;
	} else {
		const opened = openIndex(config);
		if (opened.isErr()) {
			logger.logIndexError('open', opened.error, { namespace: config.index.namespace });
			await embedder.dispose();
			return err(opened.error);
		}
		index = opened.value;
	}

	const codec = new TasteRecordCodec(embedder);
	const retrieval = new RetrievalEngine(index, codec, logger);
	const feedback = new FeedbackEngine(embedder, retrieval, index, codec, logger, config.retrieval.feedbackCandidates);
	const ingestion = new IngestionService(codec, index, logger, overrides.lookup);

	logger.debug('Taste service ready', {
		embedder: embedder.id,
		index: index.name,
		namespace: config.index.namespace,
	});

	return ok(
		new TasteService(
			{ embedder, index, retrieval, feedback, ingestion, formatter: new PromptFormatter(), logger },
			{
				namespace: config.index.namespace,
				minScore: config.retrieval.minScore,
				topK: config.retrieval.topK,
			}
		)
	);
}
