/**
 * Ingestion Service
 *
 * Keeps the vector index in step with the source-of-truth document store:
 * bulk ingestion of documents and replay of single change events.
 * Deletions upstream are never propagated.
 */

import { Result, ok, err, tryAsync, errorCause, errorMessage } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import {
	ServiceUnavailableError,
	TransientExternalError,
	dependencyFailure,
} from '../lib/errors/TasteStoreErrors.js';
import {
	CHANGE_OPERATIONS,
	type ChangeEvent,
	type ChangeEventOutcome,
	type ChangeOperation,
	type DocumentLookup,
	type IngestionReport,
} from '../models/change-event.js';
import type { RawTasteFields, TasteRecordRejection, TasteRecordWriteEntry } from '../models/taste-record.js';
import type { VectorIndex } from './vector-index/index-interface.js';
import { isRejection, type TasteRecordCodec } from './taste-codec.js';
import { STORE_DEFAULTS } from '../constants/taste-constants.js';

export interface IngestOptions {
	namespace?: string;

	/** Entries per upsert call */
	batchSize?: number;
}

export class IngestionService {
	constructor(
		private codec: TasteRecordCodec,
		private index: VectorIndex,
		private logger: Logger,
		private lookup?: DocumentLookup
	) {}

	/**
	 * Encode and upsert a batch of source documents
	 *
	 * Incomplete documents are counted and skipped. A retryable failure
	 * counts the affected documents as failed and moves on; a dependency
	 * that cannot serve at all stops the run.
	 */
	async ingest(
		documents: RawTasteFields[],
		options: IngestOptions = {}
	): Promise<Result<IngestionReport, ServiceUnavailableError>> {
		const batchSize = options.batchSize ?? STORE_DEFAULTS.UPSERT_BATCH_SIZE;
		const report: IngestionReport = {
			total: documents.length,
			upserted: 0,
			rejected: 0,
			failed: 0,
			warnings: [],
			errors: [],
		};

		let batch: TasteRecordWriteEntry[] = [];
		const flush = async (): Promise<Result<void, ServiceUnavailableError>> => {
			if (batch.length === 0) {
				return ok(undefined);
			}
			const entries = batch;
			batch = [];

			const written = await this.index.upsert(
				entries.map(({ id, vector, metadata }) => ({ id, vector, metadata })),
				options.namespace
			);
			if (written.isErr()) {
				this.logger.logIndexError('upsert', written.error, {
					namespace: options.namespace,
					additionalContext: { batchSize: entries.length },
				});
				const failure = dependencyFailure('vector index', 'upsert', written.error);
				if (failure instanceof ServiceUnavailableError) {
					return err(failure);
				}
				report.failed += entries.length;
				report.errors.push(`${failure.message} (${entries.length} records)`);
				return ok(undefined);
			}

			report.upserted += written.value;
			return ok(undefined);
		};

		for (const [position, document] of documents.entries()) {
			const encoded = await this.codec.encode(document);

			if (encoded.isErr()) {
				if (isRejection(encoded.error)) {
					report.rejected++;
					report.errors.push(describeRejection(encoded.error, position));
					continue;
				}

				const failure = dependencyFailure('embedding model', 'embed', encoded.error);
				if (failure instanceof ServiceUnavailableError) {
					return err(failure);
				}
				report.failed++;
				report.errors.push(`document ${position}: ${failure.message}`);
				continue;
			}

			const entry = encoded.value;
			report.warnings.push(...entry.warnings.map((warning) => `${entry.id}: ${warning}`));
			batch.push(entry);

			if (batch.length >= batchSize) {
				const flushed = await flush();
				if (flushed.isErr()) {
					return err(flushed.error);
				}
			}
		}

		const flushed = await flush();
		if (flushed.isErr()) {
			return err(flushed.error);
		}

		this.logger.info('Ingestion finished', {
			total: report.total,
			upserted: report.upserted,
			rejected: report.rejected,
			failed: report.failed,
		});
		return ok(report);
	}

	/**
	 * Apply one change event from the document store
	 *
	 * insert, update and replace re-encode the post-change document
	 * (looked up by key when the event carries none). delete is ignored.
	 */
	async applyChange(
		event: ChangeEvent,
		namespace?: string
	): Promise<Result<ChangeEventOutcome, ServiceUnavailableError | TransientExternalError>> {
		const key = event.documentKey?._id;
		const keyId = key === undefined || key === null ? undefined : String(key);

		if (!isChangeOperation(event.operationType)) {
			this.logger.debug('Skipping unsupported change event', { operationType: event.operationType, id: keyId });
			return ok({ action: 'ignored', reason: 'unsupported_operation', id: keyId });
		}

		if (event.operationType === 'delete') {
			this.logger.debug('Ignoring delete change event', { id: keyId });
			return ok({ action: 'ignored', reason: 'delete', id: keyId });
		}

		const document = await this.resolveDocument(event, keyId);
		if (document.isErr()) {
			return err(document.error);
		}
		if (!document.value) {
			return ok({ action: 'rejected', id: keyId, reason: 'source document not available' });
		}

		const raw: RawTasteFields = { ...document.value };
		if (raw['id'] === undefined && raw['_id'] === undefined && key !== undefined) {
			raw['_id'] = key;
		}

		const encoded = await this.codec.encode(raw);
		if (encoded.isErr()) {
			if (isRejection(encoded.error)) {
				return ok({
					action: 'rejected',
					id: encoded.error.id ?? keyId,
					reason: `missing fields: ${encoded.error.missingFields.join(', ')}`,
				});
			}
			return err(dependencyFailure('embedding model', 'embed', encoded.error));
		}

		const entry = encoded.value;
		const written = await this.index.upsert(
			[{ id: entry.id, vector: entry.vector, metadata: entry.metadata }],
			namespace
		);
		if (written.isErr()) {
			this.logger.logIndexError('upsert', written.error, {
				namespace,
				additionalContext: { id: entry.id, operationType: event.operationType },
			});
			return err(dependencyFailure('vector index', 'upsert', written.error));
		}

		for (const warning of entry.warnings) {
			this.logger.warn(`Record ${entry.id}: ${warning}`);
		}
		return ok({ action: 'upserted', id: entry.id, warnings: entry.warnings });
	}

	private async resolveDocument(
		event: ChangeEvent,
		keyId: string | undefined
	): Promise<Result<RawTasteFields | null, TransientExternalError>> {
		if (event.fullDocument) {
			return ok(event.fullDocument);
		}
		if (!this.lookup || keyId === undefined) {
			return ok(null);
		}

		const lookup = this.lookup;
		return tryAsync(
			() => lookup.findById(keyId),
			(error) => new TransientExternalError('document lookup', errorMessage(error), errorCause(error))
		);
	}
}

function isChangeOperation(value: string): value is ChangeOperation {
	return (CHANGE_OPERATIONS as readonly string[]).includes(value);
}

function describeRejection(rejection: TasteRecordRejection, position: number): string {
	const label = rejection.id ? `document ${position} (${rejection.id})` : `document ${position}`;
	return `${label}: missing fields ${rejection.missingFields.join(', ')}`;
}
