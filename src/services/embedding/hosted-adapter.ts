/**
 * Hosted Embedding Adapter
 *
 * Embeds text through an HTTP endpoint. Supports OpenAI-compatible
 * (/v1/embeddings) and Ollama (/api/embed) request and response formats.
 * Results are cached per text since the model is deterministic.
 */

import { Result, ok, err, tryAsync, errorCause, errorMessage } from '../../lib/result-types.js';
import type { EmbeddingEndpointConfig } from '../../lib/env-config.js';
import {
	EmbeddingFunction,
	EmbeddingError,
	EmbeddingRequestError,
	EmbeddingResponseError,
	EmbeddingUnavailableError,
	isNumericVector,
} from './adapter-interface.js';

const PROBE_TEXT = 'salt 1g for 1 servings in test cuisine';

export class HostedEmbeddingAdapter implements EmbeddingFunction {
	readonly id: string;
	readonly dimensions: number;

	private readonly isOllama: boolean;
	private ready = false;
	private cache = new Map<string, number[]>();
	private readonly maxCache: number;

	constructor(
		private config: EmbeddingEndpointConfig,
		options: { maxCache?: number } = {}
	) {
		this.id = `hosted:${config.model}`;
		this.dimensions = config.dimensions;
		this.isOllama = config.endpoint.includes('/api/embed');
		this.maxCache = options.maxCache ?? 512;
	}

	/**
	 * Initialize the adapter
	 *
	 * Probes the endpoint once and checks the vector length against the
	 * configured dimensions.
	 */
	async initialize(): Promise<Result<void, EmbeddingError>> {
		const probe = await this.request(PROBE_TEXT);
		if (probe.isErr()) {
			return err(
				new EmbeddingUnavailableError(
					`Embedding model '${this.config.model}' failed to load: ${probe.error.message}`,
					probe.error
				)
			);
		}

		this.ready = true;
		return ok(undefined);
	}

	isReady(): boolean {
		return this.ready;
	}

	async embed(text: string): Promise<Result<number[], EmbeddingError>> {
		if (!this.ready) {
			return err(new EmbeddingUnavailableError('Adapter not initialized. Call initialize() first.'));
		}

		const cached = this.cache.get(text);
		if (cached) {
			return ok(cached);
		}

		const result = await this.request(text);
		if (result.isOk()) {
			this.remember(text, result.value);
		}
		return result;
	}

	async dispose(): Promise<void> {
		this.cache.clear();
		this.ready = false;
	}

	/**
	 * POST one text to the endpoint and extract its vector
	 */
	private async request(text: string): Promise<Result<number[], EmbeddingError>> {
		const body = this.isOllama
			? { model: this.config.model, input: text }
			: { input: text, model: this.config.model };

		const headers: Record<string, string> = { 'Content-Type': 'application/json' };
		if (this.config.apiKey) {
			headers['Authorization'] = `Bearer ${this.config.apiKey}`;
		}

		let res: Response;
		try {
			res = await fetch(this.config.endpoint, {
				method: 'POST',
				headers,
				body: JSON.stringify(body),
			});
		} catch (error) {
			return err(
				new EmbeddingRequestError(
					`Embedding request failed: ${errorMessage(error)}`,
					undefined,
					errorCause(error)
				)
			);
		}

		if (!res.ok) {
			const detail = await res.text().catch(() => '');
			return err(new EmbeddingRequestError(`Embedding failed: ${res.status} ${detail}`.trim(), res.status));
		}

		const parsed = await tryAsync(
			(): Promise<unknown> => res.json(),
			(error) => new EmbeddingResponseError('Embedding response was not JSON', errorCause(error))
		);
		if (parsed.isErr()) {
			return err(parsed.error);
		}
		const json = parsed.value;

		const vector = extractVector(json);
		if (!vector) {
			return err(
				new EmbeddingResponseError(
					`Unexpected embedding response format: ${JSON.stringify(json).slice(0, 200)}`
				)
			);
		}

		if (vector.length !== this.dimensions) {
			return err(
				new EmbeddingResponseError(
					`Vector dimension mismatch: expected ${this.dimensions}, got ${vector.length}`
				)
			);
		}

		return ok(vector);
	}

	private remember(text: string, vector: number[]): void {
		if (this.cache.size >= this.maxCache) {
			// Map iteration order is insertion order
			const oldest = this.cache.keys().next();
			if (!oldest.done) this.cache.delete(oldest.value);
		}
		this.cache.set(text, vector);
	}
}

/**
 * Pull the first vector out of any supported response shape
 *
 * - OpenAI: { data: [{ embedding: [...] }] }
 * - Ollama: { embeddings: [[...]] }
 * - Single: { embedding: [...] }
 */
export function extractVector(json: unknown): number[] | null {
	if (typeof json !== 'object' || json === null) {
		return null;
	}

	if ('data' in json && Array.isArray(json.data)) {
		const first: unknown = json.data[0];
		if (typeof first === 'object' && first !== null && 'embedding' in first && isNumericVector(first.embedding)) {
			return first.embedding;
		}
		return null;
	}

	if ('embeddings' in json && Array.isArray(json.embeddings)) {
		const first: unknown = json.embeddings[0];
		return isNumericVector(first) ? first : null;
	}

	if ('embedding' in json && isNumericVector(json.embedding)) {
		return json.embedding;
	}

	return null;
}
