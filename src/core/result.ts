/**
 * Tagged success/failure value used where a failure is an expected outcome
 * (completion calls, process spawning, file writes) rather than a bug.
 *
 * Dependency direction: result.ts → nothing (leaf module)
 * Used by: providers, workflow controller, test runner
 */

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}
