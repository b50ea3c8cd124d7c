/**
 * Result<T, E> — explicit success/failure for fallible construction.
 *
 * Recording and iteration throw (they only fail on caller bugs); building a
 * histogram from untrusted options returns a Result so callers can branch.
 */

export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Apply `fn` to a success value; a failure passes through untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	if (!result.ok) return result;
	return ok(fn(result.value));
}

/** The success value, or the failure rethrown. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (!result.ok) {
		throw result.error instanceof Error ? result.error : new Error(String(result.error));
	}
	return result.value;
}
