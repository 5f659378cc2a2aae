/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result/Either pattern using neverthrow.
 * Store operations report failures as values instead of throwing across
 * service boundaries.
 */

import { Result as NeverthrowResult, ok as neverthrowOk, err as neverthrowErr } from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute an async function and wrap result in Result type
 *
 * @param fn - Async function to execute
 * @param errorHandler - Converts a thrown value into the error type
 */
export async function tryAsync<T, E>(
	fn: () => Promise<T>,
	errorHandler: (error: unknown) => E
): Promise<Result<T, E>> {
	try {
		const value = await fn();
		return ok(value);
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Best-effort message extraction from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

/**
 * The thrown value as an Error cause, when it is one
 */
export function errorCause(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}
