/**
 * @fileoverview Position arithmetic.
 * Positions are one-based; moves are either relative (a delta) or absolute
 * (an override) per axis, never both on the same axis.
 * Layer 1 - imports only from types/.
 *
 * @module utils/position
 */

import type { Position, Span } from '../types/base.js';

// ============================================================
// Types
// ============================================================

type LineMove =
    | { readonly line?: number; readonly absoluteLine?: never }
    | { readonly absoluteLine: number; readonly line?: never };

type ColumnMove =
    | { readonly column?: number; readonly absoluteColumn?: never }
    | { readonly absoluteColumn: number; readonly column?: never };

/**
 * A move along both axes. Omitted axes stay where they are.
 *
 * @example
 * movePosition(p, { line: 1, absoluteColumn: 1 }); // start of the next line
 */
export type PositionMove = LineMove & ColumnMove;

// ============================================================
// Operations
// ============================================================

export function position(line: number, column: number): Position {
    return { line, column };
}

export function movePosition(from: Position, move: PositionMove): Position {
    const line = move.absoluteLine ?? from.line + (move.line ?? 0);
    const column = move.absoluteColumn ?? from.column + (move.column ?? 0);
    return { line, column };
}

/**
 * Expresses `pos` relative to the line of `reference`.
 * Only the line is rebased; the column stays absolute.
 */
export function normalizePosition(pos: Position, reference: Position): Position {
    return { line: pos.line - reference.line, column: pos.column };
}

/**
 * Orders positions: negative when `a` comes first.
 */
export function comparePositions(a: Position, b: Position): number {
    return a.line === b.line ? a.column - b.column : a.line - b.line;
}

export function span(start: Position, end: Position = start): Span {
    return { start, end };
}
