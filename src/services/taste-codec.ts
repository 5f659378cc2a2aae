/**
 * Taste Record Codec
 *
 * Converts loosely-typed source documents into index entries (validated
 * metadata plus the vector of the derived text) and index entries back
 * into TasteRecords.
 */

import { Result, ok, err } from '../lib/result-types.js';
import type { EmbeddingError, EmbeddingFunction } from './embedding/adapter-interface.js';
import type { Metadata } from '../models/vector-index.js';
import {
	REQUIRED_FIELDS,
	type PreparedTasteRecord,
	type Quantity,
	type RawTasteFields,
	type RequiredField,
	type TasteMetadata,
	type TasteRecord,
	type TasteRecordRejection,
	type TasteRecordWriteEntry,
} from '../models/taste-record.js';
import { RECORD_DEFAULTS } from '../constants/taste-constants.js';
import { round2 } from './prompt-formatter.js';

/**
 * Fields the derived text is rendered from
 */
export interface DerivedTextFields {
	ingredient: string;
	amount: Quantity;
	unit: string;
	servings: Quantity;
	cuisine: string;
}

/**
 * Canonical text of a record; the only input to the embedding function
 *
 * Numbers render at display precision, so an amount stored as
 * 110.00000000000001 after feedback reads "110".
 */
export function renderDerivedText(fields: DerivedTextFields): string {
	const amount = renderQuantity(fields.amount);
	const servings = renderQuantity(fields.servings);
	return `${fields.ingredient} ${amount}${fields.unit} for ${servings} servings in ${fields.cuisine} cuisine`;
}

function renderQuantity(value: Quantity): string {
	return typeof value === 'number' ? String(round2(value)) : value;
}

export function isRejection(value: unknown): value is TasteRecordRejection {
	return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'rejected';
}

export class TasteRecordCodec {
	constructor(private embedder: EmbeddingFunction) {}

	/**
	 * Validate, coerce and embed a source document
	 *
	 * Rejections never reach the embedding function.
	 */
	async encode(
		raw: RawTasteFields
	): Promise<Result<TasteRecordWriteEntry, TasteRecordRejection | EmbeddingError>> {
		const prepared = this.prepare(raw);
		if (prepared.isErr()) {
			return err(prepared.error);
		}

		const vector = await this.embedder.embed(prepared.value.metadata.original_text);
		if (vector.isErr()) {
			return err(vector.error);
		}

		return ok({ ...prepared.value, vector: vector.value });
	}

	/**
	 * Validation, coercion and derived text, without embedding
	 */
	prepare(raw: RawTasteFields): Result<PreparedTasteRecord, TasteRecordRejection> {
		const id = stringifyId(raw['id'] ?? raw['_id']);

		const missingFields: RequiredField[] = REQUIRED_FIELDS.filter((field) => {
			if (field === 'id') return id === undefined;
			return isMissing(raw[field]);
		});
		if (missingFields.length > 0 || id === undefined) {
			const rejection: TasteRecordRejection = { kind: 'rejected', missingFields, id };
			return err(rejection);
		}

		const warnings: string[] = [];
		const amount = coerceQuantity(raw['amount']);
		if (typeof amount === 'string') {
			warnings.push(`amount "${amount}" is not numeric; stored as text`);
		}

		const servings = coerceQuantity(raw['servings']);
		if (typeof servings === 'string') {
			warnings.push(`servings "${servings}" is not numeric; stored as text`);
		}

		let feedbackWeight: number = RECORD_DEFAULTS.FEEDBACK_WEIGHT;
		if (!isMissing(raw['feedback_weight'])) {
			const weight = coerceQuantity(raw['feedback_weight']);
			if (typeof weight === 'number' && weight >= 0) {
				feedbackWeight = weight;
			} else {
				warnings.push(
					`feedback_weight "${String(raw['feedback_weight'])}" is invalid; using ${RECORD_DEFAULTS.FEEDBACK_WEIGHT}`
				);
			}
		}

		const unit = isMissing(raw['unit']) ? RECORD_DEFAULTS.UNIT : String(raw['unit']);
		const ingredient = String(raw['ingredient']);
		const cuisine = String(raw['cuisine']);

		const metadata: TasteMetadata = {
			user_id: String(raw['user_id']),
			ingredient,
			amount,
			unit,
			servings,
			cuisine,
			feedback_weight: feedbackWeight,
			original_text: renderDerivedText({ ingredient, amount, unit, servings, cuisine }),
		};

		return ok({ id, metadata, warnings });
	}

	/**
	 * Project an index entry back into a TasteRecord
	 *
	 * Missing or mistyped metadata falls back to empty values so display
	 * code can substitute neutral wording.
	 */
	decode(entry: { id: string; metadata: Metadata; vector?: number[] }): TasteRecord {
		const md = entry.metadata;
		const weight = md['feedback_weight'];

		const record: TasteRecord = {
			id: entry.id,
			userId: textField(md, 'user_id'),
			ingredient: textField(md, 'ingredient'),
			amount: quantityField(md, 'amount'),
			unit: textField(md, 'unit'),
			servings: quantityField(md, 'servings'),
			cuisine: textField(md, 'cuisine'),
			feedbackWeight: typeof weight === 'number' && Number.isFinite(weight) ? weight : RECORD_DEFAULTS.FEEDBACK_WEIGHT,
			derivedText: textField(md, 'original_text'),
		};

		if (entry.vector) {
			record.embedding = entry.vector;
		}
		return record;
	}
}

function isMissing(value: unknown): boolean {
	return value === undefined || value === null || value === '';
}

/**
 * Source ids arrive as strings, numbers, driver ObjectIds (toString gives
 * the hex form) or extended-JSON `{ $oid }` objects
 */
function stringifyId(value: unknown): string | undefined {
	if (isMissing(value)) return undefined;
	if (typeof value === 'object' && value !== null && '$oid' in value && typeof value.$oid === 'string') {
		return value.$oid;
	}
	return String(value);
}

/**
 * Numeric value when the input is a finite number or numeric string,
 * otherwise the original value as text
 */
function coerceQuantity(value: unknown): Quantity {
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value.trim());
		if (Number.isFinite(parsed)) {
			return parsed;
		}
	}
	return String(value);
}

function textField(md: Metadata, key: string): string {
	const value = md[key];
	return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

function quantityField(md: Metadata, key: string): Quantity {
	const value = md[key];
	return typeof value === 'number' || typeof value === 'string' ? value : '';
}
