/**
 * Metadata filter grammar
 *
 * A filter is either a dictionary of exact-match fields (ANDed) or
 * `{ $and: [filter, ...] }`. Both forms nest; evaluation flattens them to
 * one list of equality conditions.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import type {
	AndFilter,
	FieldCondition,
	Metadata,
	MetadataFilter,
} from '../../models/vector-index.js';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class FilterError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'FilterError';
		Object.setPrototypeOf(this, FilterError.prototype);
	}
}

export function isAndFilter(filter: MetadataFilter): filter is AndFilter {
	return '$and' in filter && Array.isArray(filter.$and);
}

/**
 * Conjoin filters, skipping absent ones
 */
export function andFilters(...filters: Array<MetadataFilter | undefined>): MetadataFilter {
	const present = filters.filter((f): f is MetadataFilter => f !== undefined);
	if (present.length === 1 && present[0]) {
		return present[0];
	}
	return { $and: present };
}

/**
 * Flatten a filter into equality conditions
 *
 * Field names must be plain identifiers since adapters embed them in
 * query paths.
 */
export function flattenFilter(filter: MetadataFilter | undefined): Result<FieldCondition[], FilterError> {
	if (!filter) {
		return ok([]);
	}

	if (isAndFilter(filter)) {
		const conditions: FieldCondition[] = [];
		for (const child of filter.$and) {
			const flattened = flattenFilter(child);
			if (flattened.isErr()) {
				return flattened;
			}
			conditions.push(...flattened.value);
		}
		return ok(conditions);
	}

	const conditions: FieldCondition[] = [];
	for (const [field, value] of Object.entries(filter)) {
		if (!FIELD_NAME.test(field)) {
			return err(new FilterError(`Invalid filter field name: "${field}"`));
		}
		conditions.push({ field, value });
	}
	return ok(conditions);
}

/**
 * Check metadata against flattened conditions
 */
export function matchesConditions(metadata: Metadata, conditions: FieldCondition[]): boolean {
	return conditions.every(({ field, value }) => metadata[field] === value);
}
