/**
 * Configuration Management
 *
 * Centralized configuration with environment variable and .env support.
 */

import { config as loadDotenv } from 'dotenv';
import { Result, ok, err, errorMessage } from './result-types.js';
import { ConfigError } from './errors/TasteStoreErrors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { RETRIEVAL_DEFAULTS, STORE_DEFAULTS } from '../constants/taste-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Hosted embedding endpoint configuration
 */
export interface EmbeddingEndpointConfig {
	/** Endpoint URL (OpenAI-compatible /v1/embeddings or Ollama /api/embed) */
	endpoint: string;

	/** Bearer token; local endpoints usually need none */
	apiKey?: string;

	/** Model name sent with each request */
	model: string;

	/** Expected vector length */
	dimensions: number;
}

export type IndexBackend = 'sqlite' | 'memory';

/**
 * Vector index configuration
 */
export interface IndexConfig {
	backend: IndexBackend;

	/** SQLite database file (sqlite backend only) */
	dbPath: string;

	/** Namespace all reads and writes go to */
	namespace: string;
}

/**
 * Retrieval tuning
 */
export interface RetrievalConfig {
	/** Similarity threshold for search */
	minScore: number;

	/** Candidates requested per search */
	topK: number;

	/** Candidates inspected when locating a feedback target */
	feedbackCandidates: number;
}

export interface LoggingConfig {
	logDir: string;
	level: LogLevel;
}

/**
 * Full store configuration
 */
export interface TasteStoreConfig {
	embedding: EmbeddingEndpointConfig;
	index: IndexConfig;
	retrieval: RetrievalConfig;
	logging: LoggingConfig;
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Reads TASTE_* variables from the environment (optionally seeded from a
 * .env file) and validates them into a TasteStoreConfig.
 */
export class ConfigurationManager {
	constructor(
		private env: NodeJS.ProcessEnv = process.env,
		private envPath?: string
	) {}

	/**
	 * Load environment variables from .env file
	 *
	 * Values land in process.env. A missing .env file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadDotenv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(new ConfigError(`Failed to load .env file: ${errorMessage(error)}`));
		}
	}

	/**
	 * Build the store configuration
	 */
	getConfig(): Result<TasteStoreConfig, ConfigError> {
		const embedding = this.getEmbeddingConfig();
		if (embedding.isErr()) {
			return err(embedding.error);
		}

		const index = this.getIndexConfig();
		if (index.isErr()) {
			return err(index.error);
		}

		const retrieval = this.getRetrievalConfig();
		if (retrieval.isErr()) {
			return err(retrieval.error);
		}

		const level = this.getEnvVar('TASTE_LOG_LEVEL') ?? 'warn';
		if (!isLogLevel(level)) {
			return err(new ConfigError(`Invalid TASTE_LOG_LEVEL "${level}". Valid levels: debug, info, warn, error, fatal`));
		}

		return ok({
			embedding: embedding.value,
			index: index.value,
			retrieval: retrieval.value,
			logging: {
				logDir: this.getEnvVar('TASTE_LOG_DIR') ?? STORE_DEFAULTS.LOG_DIR,
				level,
			},
		});
	}

	/**
	 * Get embedding endpoint configuration
	 */
	private getEmbeddingConfig(): Result<EmbeddingEndpointConfig, ConfigError> {
		const endpoint = this.getEnvVar('TASTE_EMBED_ENDPOINT');
		if (!endpoint) {
			return err(
				new ConfigError(
					'Missing required config: TASTE_EMBED_ENDPOINT. ' +
						'Set this environment variable or add it to your .env file.'
				)
			);
		}

		try {
			new URL(endpoint);
		} catch {
			return err(new ConfigError(`TASTE_EMBED_ENDPOINT must be a valid URL, got: "${endpoint}"`));
		}

		const dimensions = this.getEnvNumber('TASTE_EMBED_DIMENSIONS') ?? STORE_DEFAULTS.EMBEDDING_DIMENSIONS;
		if (!Number.isInteger(dimensions) || dimensions <= 0) {
			return err(new ConfigError(`TASTE_EMBED_DIMENSIONS must be a positive integer, got: ${dimensions}`));
		}

		return ok({
			endpoint,
			apiKey: this.getEnvVar('TASTE_EMBED_API_KEY'),
			model: this.getEnvVar('TASTE_EMBED_MODEL') ?? STORE_DEFAULTS.EMBEDDING_MODEL,
			dimensions,
		});
	}

	/**
	 * Get vector index configuration
	 */
	private getIndexConfig(): Result<IndexConfig, ConfigError> {
		const backend = this.getEnvVar('TASTE_INDEX') ?? 'sqlite';
		if (backend !== 'sqlite' && backend !== 'memory') {
			return err(new ConfigError(`Unknown index backend "${backend}". Valid backends: sqlite, memory`));
		}

		return ok({
			backend,
			dbPath: this.getEnvVar('TASTE_DB_PATH') ?? STORE_DEFAULTS.DB_PATH,
			namespace: this.env['TASTE_NAMESPACE'] ?? STORE_DEFAULTS.NAMESPACE,
		});
	}

	/**
	 * Get retrieval tuning configuration
	 */
	private getRetrievalConfig(): Result<RetrievalConfig, ConfigError> {
		const minScore = this.getEnvNumber('TASTE_MIN_SCORE') ?? RETRIEVAL_DEFAULTS.MIN_SCORE;
		if (minScore < 0 || minScore > 1) {
			return err(new ConfigError(`TASTE_MIN_SCORE must be between 0 and 1, got: ${minScore}`));
		}

		const topK = this.getEnvNumber('TASTE_TOP_K') ?? RETRIEVAL_DEFAULTS.TOP_K;
		const feedbackCandidates =
			this.getEnvNumber('TASTE_FEEDBACK_CANDIDATES') ?? RETRIEVAL_DEFAULTS.FEEDBACK_CANDIDATES;

		for (const [key, value] of [
			['TASTE_TOP_K', topK],
			['TASTE_FEEDBACK_CANDIDATES', feedbackCandidates],
		] as const) {
			if (!Number.isInteger(value) || value <= 0) {
				return err(new ConfigError(`${key} must be a positive integer, got: ${value}`));
			}
		}

		return ok({ minScore, topK, feedbackCandidates });
	}

	/**
	 * Get environment variable; empty strings count as unset
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === undefined || value === '' ? undefined : value;
	}

	/**
	 * Get environment variable as number
	 */
	private getEnvNumber(key: string): number | undefined {
		const value = this.getEnvVar(key);
		if (value === undefined) return undefined;
		const num = Number(value);
		return Number.isNaN(num) ? undefined : num;
	}

	/**
	 * Mask API key for safe logging (show only last 4 characters)
	 */
	maskApiKey(apiKey: string): string {
		if (apiKey.length <= 4) {
			return '****';
		}
		return '****' + apiKey.slice(-4);
	}
}

/**
 * Load .env and build the configuration in one step
 *
 * @param envPath - Optional path to .env file
 */
export function loadConfig(envPath?: string): Result<TasteStoreConfig, ConfigError> {
	const manager = new ConfigurationManager(process.env, envPath);
	const loaded = manager.loadEnv();
	if (loaded.isErr()) {
		return err(loaded.error);
	}
	return manager.getConfig();
}
