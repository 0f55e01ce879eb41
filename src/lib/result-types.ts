/**
 * Result helpers
 *
 * Fallible operations return a neverthrow Result instead of throwing.
 * Library exceptions are caught at component boundaries through trySync.
 */

import { Result as NeverthrowResult, ok as neverthrowOk, err as neverthrowErr } from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Run a synchronous function, mapping a throw to an Err
 */
export function trySync<T, E>(fn: () => T, errorHandler: (error: unknown) => E): Result<T, E> {
	try {
		return ok(fn());
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
