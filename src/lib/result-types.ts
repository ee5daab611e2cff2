/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result pattern using neverthrow.
 * Operations in this package return Results instead of throwing.
 */

import {
	Result as NeverthrowResult,
	Ok,
	Err,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export { Ok, Err };
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute a synchronous function and wrap result in Result type
 *
 * @param fn - Synchronous function to execute
 * @param errorHandler - Function to convert errors to type E
 */
export function trySync<T, E>(
	fn: () => T,
	errorHandler: (error: unknown) => E
): Result<T, E> {
	try {
		const value = fn();
		return ok(value);
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Execute an async function and wrap result in Result type
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
