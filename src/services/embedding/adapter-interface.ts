/**
 * Embedding Function Interface
 *
 * Contract for the external embedding function: text in, fixed-length
 * numeric vector out. Deterministic for a given model.
 */

import type { Result } from '../../lib/result-types.js';

// ============================================================================
// Error Hierarchy
// ============================================================================

/**
 * Base error class for all embedding errors
 */
export abstract class EmbeddingError extends Error {
	abstract readonly code: string;
	abstract readonly retryable: boolean;
	readonly timestamp: Date = new Date();

	constructor(message: string, public override cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		// Ensure prototype chain is correct for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * Model not loaded, endpoint misconfigured, or adapter not initialized (non-retryable)
 */
export class EmbeddingUnavailableError extends EmbeddingError {
	readonly code = 'EMBEDDING_UNAVAILABLE';
	readonly retryable = false;
}

/**
 * Network or HTTP failure talking to the model (retryable)
 */
export class EmbeddingRequestError extends EmbeddingError {
	readonly code = 'EMBEDDING_REQUEST_FAILED';
	readonly retryable = true;

	constructor(message: string, public readonly status?: number, cause?: Error) {
		super(message, cause);
	}
}

/**
 * Response was not a vector of the expected length (non-retryable)
 */
export class EmbeddingResponseError extends EmbeddingError {
	readonly code = 'EMBEDDING_BAD_RESPONSE';
	readonly retryable = false;
}

// ============================================================================
// Embedding Function
// ============================================================================

/**
 * Embedding function contract
 */
export interface EmbeddingFunction {
	/** Unique identifier (e.g., "hosted:all-MiniLM-L6-v2") */
	readonly id: string;

	/** Expected vector length */
	readonly dimensions: number;

	/**
	 * Prepare the function for use (validate endpoint, probe the model)
	 */
	initialize(): Promise<Result<void, EmbeddingError>>;

	/**
	 * Embed one text
	 *
	 * @returns The vector, or EmbeddingUnavailableError when the model is not loaded
	 */
	embed(text: string): Promise<Result<number[], EmbeddingError>>;

	/** True once initialize() succeeded */
	isReady(): boolean;

	/** Release resources */
	dispose(): Promise<void>;
}

/**
 * Check that a value is a vector of finite numbers
 */
export function isNumericVector(value: unknown): value is number[] {
	return (
		Array.isArray(value) &&
		value.length > 0 &&
		value.every((v) => typeof v === 'number' && Number.isFinite(v))
	);
}
