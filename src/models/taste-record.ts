/**
 * Taste Record Model
 *
 * One user's observed ingredient-quantity preference, plus the shapes it
 * takes on the way into and out of the vector index.
 */

import type { Metadata } from './vector-index.js';

/**
 * A quantity as stored. Numeric after coercion; the original value is kept
 * as text when coercion failed.
 */
export type Quantity = number | string;

/**
 * Taste Record entity
 */
export interface TasteRecord {
	/** Stable external identifier, the index primary key */
	id: string;

	/** Owner of the preference */
	userId: string;

	/** Canonical ingredient name */
	ingredient: string;

	amount: Quantity;

	/** Unit of the amount; may be empty */
	unit: string;

	/** Serving count the amount was observed for */
	servings: Quantity;

	cuisine: string;

	/** Confidence scalar, starts at 1.0 */
	feedbackWeight: number;

	/** Canonical rendering; the sole embedding input */
	derivedText: string;

	/** Present when the source carried the vector */
	embedding?: number[];
}

/**
 * Metadata stored alongside each vector
 */
export interface TasteMetadata extends Metadata {
	user_id: string;
	ingredient: string;
	amount: Quantity;
	unit: string;
	servings: Quantity;
	cuisine: string;
	feedback_weight: number;
	original_text: string;
}

/**
 * Loosely-typed field bag from a source document or a caller
 */
export type RawTasteFields = Record<string, unknown>;

/**
 * A validated, coerced record that has not been embedded yet
 */
export interface PreparedTasteRecord {
	id: string;
	metadata: TasteMetadata;

	/** Coercion fallbacks applied while preparing */
	warnings: string[];
}

/**
 * Entry ready for upsert: metadata and the vector of its derived text
 */
export interface TasteRecordWriteEntry extends PreparedTasteRecord {
	vector: number[];
}

/**
 * A retrieved record with its similarity score
 */
export interface TasteMatch {
	record: TasteRecord;
	score: number;
}

export const REQUIRED_FIELDS = ['user_id', 'ingredient', 'amount', 'servings', 'cuisine', 'id'] as const;
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * Why a field bag was not indexed
 */
export interface TasteRecordRejection {
	kind: 'rejected';
	missingFields: RequiredField[];

	/** Source id when one was present */
	id?: string;
}
