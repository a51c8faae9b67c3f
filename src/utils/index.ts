/**
 * @fileoverview Barrel file for utility functions.
 * Layer 1 - pure utility functions that import only from types/.
 *
 * @module utils
 */

// Result helpers for boundary failures
export { ok, err, mapResult, mapError, flatMapResult } from './result.js';

// Position arithmetic
export {
    position,
    movePosition,
    normalizePosition,
    comparePositions,
    span,
} from './position.js';
export type { PositionMove } from './position.js';
