/**
 * @fileoverview Foundational types for docstring-lint.
 * This module contains position/span interfaces and result types.
 * Zero imports - this is the base layer of the type system.
 *
 * @module types/base
 */

// ============================================================
// Position and Span Types
// ============================================================

/**
 * Position in a source file.
 * Both line and column are one-based.
 */
export interface Position {
    /** One-based line number */
    readonly line: number;
    /** One-based column on the line */
    readonly column: number;
}

/**
 * Region of a source file between two positions.
 * The span is inclusive of start and exclusive of end; `start == end`
 * is a zero-width anchor.
 */
export interface Span {
    /** Start position (inclusive) */
    readonly start: Position;
    /** End position (exclusive) */
    readonly end: Position;
}

// ============================================================
// Result Types
// ============================================================

/**
 * Result type for operations that can fail.
 * Provides type-safe error handling without exceptions.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) {
 *     return { ok: false, error: 'Division by zero' };
 *   }
 *   return { ok: true, value: a / b };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Async result type for asynchronous operations that can fail.
 * Wraps Result in a Promise for async/await compatibility.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;
