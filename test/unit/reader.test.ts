/**
 * @fileoverview Unit tests for the docstring line reader.
 * @module test/unit/reader
 */

import { describe, it, expect } from 'vitest';
import { LineReader, isIndexDirective, isUnderline } from '../../src/core/docstring/reader.js';
import { linesAt } from '../helpers/fixtures.js';

function texts(lines: readonly { text: string }[]): string[] {
    return lines.map((line) => line.text);
}

describe('isUnderline', () => {
    it('accepts runs of a single marker', () => {
        expect(isUnderline('----------')).toBe(true);
        expect(isUnderline('    ====  ')).toBe(true);
    });

    it('rejects mixed or empty markers', () => {
        expect(isUnderline('-=-')).toBe(false);
        expect(isUnderline('')).toBe(false);
        expect(isUnderline('--- x')).toBe(false);
    });
});

describe('isIndexDirective', () => {
    it('recognises an indented index directive', () => {
        expect(isIndexDirective('    .. index:: widgets')).toBe(true);
        expect(isIndexDirective('.. note::')).toBe(false);
    });
});

describe('LineReader', () => {
    const lines = linesAt(['Summary.', '', 'Parameters', '----------', 'x : int']);

    it('reads forward and returns null at EOF', () => {
        const reader = new LineReader(linesAt(['a']));
        expect(reader.previous()).toBeNull();
        expect(reader.read()?.text).toBe('a');
        expect(reader.previous()?.text).toBe('a');
        expect(reader.eof()).toBe(true);
        expect(reader.read()).toBeNull();
    });

    it('peeks without moving', () => {
        const reader = new LineReader(lines);
        expect(reader.peek(2)?.text).toBe('Parameters');
        expect(reader.peek(9)).toBeNull();
        expect(reader.peek()?.text).toBe('Summary.');
    });

    it('stops a paragraph at a blank line', () => {
        const reader = new LineReader(lines);
        expect(texts(reader.readUntilBlankRun())).toEqual(['Summary.']);
        reader.skipBlankLines();
        expect(reader.peek()?.text).toBe('Parameters');
    });

    it('detects a header through its underline', () => {
        const reader = new LineReader(lines);
        expect(reader.isAtSectionBoundary()).toBe(false);
        reader.read();
        expect(reader.isAtSectionBoundary()).toBe(false);
        reader.read();
        expect(reader.isAtSectionBoundary()).toBe(true);
    });

    it('looks past blank lines for the underline', () => {
        const reader = new LineReader(linesAt(['Notes', '', '-----']));
        expect(reader.isAtSectionBoundary()).toBe(true);
    });

    it('treats an index directive as a boundary without underline', () => {
        const reader = new LineReader(linesAt(['.. index:: widgets', '   single: frob']));
        expect(reader.isAtSectionBoundary()).toBe(true);
    });

    it('stops a paragraph at a header with no blank line before it', () => {
        const reader = new LineReader(linesAt(['Summary.', 'Notes', '-----']));
        expect(texts(reader.readUntilBlankRun())).toEqual(['Summary.']);
        expect(reader.peek()?.text).toBe('Notes');
    });

    it('reads up to the next section header', () => {
        const reader = new LineReader(linesAt(['a', '', 'b', 'Notes', '-----', 'c']));
        expect(texts(reader.readUntilNextSectionBoundary())).toEqual(['a', '', 'b']);
        expect(reader.peek()?.text).toBe('Notes');
    });

    it('reads nothing when already at a header', () => {
        const reader = new LineReader(linesAt(['Notes', '-----']));
        expect(reader.readUntilNextSectionBoundary()).toEqual([]);
    });
});
