/**
 * @fileoverview Unit tests for position arithmetic.
 * @module test/unit/position
 */

import { describe, it, expect } from 'vitest';
import {
    comparePositions,
    movePosition,
    normalizePosition,
    position,
    span,
} from '../../src/utils/position.js';

describe('movePosition', () => {
    const from = position(4, 9);

    it('moves relative to the current position', () => {
        expect(movePosition(from, { line: 2, column: -3 })).toEqual({ line: 6, column: 6 });
        expect(movePosition(from, {})).toEqual(from);
    });

    it('moves to absolute coordinates per axis', () => {
        expect(movePosition(from, { absoluteLine: 1 })).toEqual({ line: 1, column: 9 });
        expect(movePosition(from, { line: 1, absoluteColumn: 1 })).toEqual({ line: 5, column: 1 });
    });
});

describe('normalizePosition', () => {
    it('makes the line relative and keeps the column', () => {
        expect(normalizePosition(position(12, 7), position(10, 5))).toEqual({ line: 2, column: 7 });
    });
});

describe('comparePositions', () => {
    it('orders by line, then column', () => {
        expect(comparePositions(position(1, 9), position(2, 1))).toBeLessThan(0);
        expect(comparePositions(position(2, 5), position(2, 3))).toBeGreaterThan(0);
        expect(comparePositions(position(2, 5), position(2, 5))).toBe(0);
    });
});

describe('span', () => {
    it('is zero-width without an end', () => {
        expect(span(position(3, 3))).toEqual({ start: { line: 3, column: 3 }, end: { line: 3, column: 3 } });
    });
});
