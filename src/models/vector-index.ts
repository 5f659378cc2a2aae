/**
 * Vector Index Model
 *
 * Entry, query and filter shapes shared by every vector index adapter.
 */

export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/**
 * Exact-match equality per field; all fields ANDed
 */
export type FieldFilter = { readonly [field: string]: MetadataValue };

/**
 * Conjunction of pre-built filters
 */
export interface AndFilter {
	readonly $and: readonly MetadataFilter[];
}

export type MetadataFilter = FieldFilter | AndFilter;

/**
 * One record in the index
 */
export interface IndexEntry {
	id: string;
	vector: number[];
	metadata: Metadata;
}

/**
 * k-NN query
 */
export interface IndexQuery {
	vector: number[];
	topK: number;
	filter?: MetadataFilter;
	namespace?: string;
}

/**
 * One query hit; higher score means more similar
 */
export interface IndexMatch {
	id: string;
	score: number;
	metadata: Metadata;
}

/**
 * A single equality condition after filter flattening
 */
export interface FieldCondition {
	field: string;
	value: MetadataValue;
}
