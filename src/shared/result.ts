/**
 * Result<T, E>: explicit success/failure values for every pipeline stage.
 *
 * Stages never throw across their boundary: they return Result, and the
 * client hands that Result to the caller unchanged. Narrow on `ok`.
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

/** Runs `fn`, turning a throw into a failed Result. Non-Error throws are wrapped. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
	try {
		return ok(fn());
	} catch (e) {
		return err(e instanceof Error ? e : new Error(String(e)));
	}
}
