/**
 * @fileoverview Result helpers for the boundaries of the linter
 * (configuration and manifest loading), where failures are values.
 *
 * @module utils/result
 */

import type { Result } from '../types/base.js';

/**
 * Wraps a success value.
 *
 * @example
 * const result = ok(getDefault());
 * // result: { ok: true, value: { select: null, ... } }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Wraps a failure value.
 *
 * @example
 * const result = err({ type: 'parse', message: 'Unexpected token' });
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Applies `fn` to the success value; failures pass through unchanged.
 *
 * @example
 * const names = mapResult(decodeManifest(json), (m) => m.declarations.length);
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return { ok: true, value: fn(result.value) };
    }
    return result;
}

/**
 * Applies `fn` to the failure value; successes pass through unchanged.
 */
export function mapError<T, E, F>(
    result: Result<T, E>,
    fn: (error: E) => F
): Result<T, F> {
    if (result.ok) {
        return result;
    }
    return { ok: false, error: fn(result.error) };
}

/**
 * Chains a fallible step after a successful one.
 *
 * @example
 * const config = flatMapResult(parseJson(text), validateConfig);
 */
export function flatMapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>
): Result<U, E> {
    if (result.ok) {
        return fn(result.value);
    }
    return result;
}
