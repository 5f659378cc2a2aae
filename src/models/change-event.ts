/**
 * Change Event Model
 *
 * Change notifications from the source-of-truth document store.
 */

import type { RawTasteFields } from './taste-record.js';

export const CHANGE_OPERATIONS = ['insert', 'update', 'replace', 'delete'] as const;
export type ChangeOperation = (typeof CHANGE_OPERATIONS)[number];

export interface ChangeEvent {
  /** Operation type; other values are skipped */
  operationType: string;

  /** Key of the changed document */
  documentKey?: { _id?: unknown };

  /** Post-change document, when the stream delivers it */
  fullDocument?: RawTasteFields | null;
}

export type ChangeEventOutcome =
  | { action: 'upserted'; id: string; warnings: string[] }
  | { action: 'ignored'; reason: 'delete' | 'unsupported_operation'; id?: string }
  | { action: 'rejected'; id?: string; reason: string };

/**
 * Looks up a source document when a change event carries no full document
 */
export interface DocumentLookup {
  findById(id: string): Promise<RawTasteFields | null>;
}

/**
 * Batch ingestion summary
 */
export interface IngestionReport {
  /** Documents seen */
  total: number;

  /** Records written to the index */
  upserted: number;

  /** Documents missing required fields */
  rejected: number;

  /** Documents whose embedding or write failed */
  failed: number;

  /** Coercion warnings, prefixed with the record id */
  warnings: string[];

  errors: string[];
}
