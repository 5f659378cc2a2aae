/**
 * taste-store public API
 */

export { createTasteService, openIndex, type TasteServiceOverrides } from './services/taste-service-factory.js';
export { TasteService, searchQueryText, type TasteServiceSettings } from './services/taste-service.js';
export { TasteRecordCodec, renderDerivedText, isRejection } from './services/taste-codec.js';
export { RetrievalEngine, rank, type FindOptions, type RankingMode } from './services/retrieval-engine.js';
export { FeedbackEngine, adjustAmount } from './services/feedback-engine.js';
export { IngestionService, type IngestOptions } from './services/ingestion-service.js';
export { PromptFormatter, PREFERENCES_PREFIX } from './services/prompt-formatter.js';

export {
	EmbeddingError,
	EmbeddingUnavailableError,
	EmbeddingRequestError,
	EmbeddingResponseError,
	type EmbeddingFunction,
} from './services/embedding/adapter-interface.js';
export { HostedEmbeddingAdapter } from './services/embedding/hosted-adapter.js';

export { VectorIndexError, VectorIndexUnavailableError, type VectorIndex } from './services/vector-index/index-interface.js';
export { SqliteVecIndex } from './services/vector-index/sqlite-vec-index.js';
export { InMemoryVectorIndex } from './services/vector-index/in-memory-index.js';

export * from './lib/errors/TasteStoreErrors.js';
export { ConfigurationManager, loadConfig, type TasteStoreConfig } from './lib/env-config.js';
export { Logger, createSilentLogger, type LogLevel } from './lib/logger.js';
export type { Result } from './lib/result-types.js';

export * from './models/taste-record.js';
export * from './models/vector-index.js';
export * from './models/change-event.js';
export { FEEDBACK_KINDS, isFeedback, type Feedback, type FeedbackUpdate, type FeedbackOptions } from './models/feedback.js';
export type { SearchRequest, FeedbackRequest, SearchItem, SearchResponse, SearchStatus } from './models/requests.js';
