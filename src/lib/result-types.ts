/**
 * Result Type Utilities
 *
 * Re-exports and utilities for the Result/Either pattern using neverthrow.
 * Operations that can be rejected return a Result instead of throwing.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute an async function and wrap result in Result type
 *
 * @param fn - Async function to execute
 * @param errorHandler - Function to convert errors to type E
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
