/**
 * @fileoverview Positioned docstring lines and paragraph helpers.
 * Layer 1 - imports only from types/ and utils/.
 *
 * @module core/docstring/lines
 */

import type { Position } from '../../types/base.js';
import type { DocstringLine, Paragraph, RawDocstring } from '../../types/docstring.js';
import { movePosition } from '../../utils/position.js';

// ============================================================
// Splitting
// ============================================================

/**
 * Position of the first body character, right after the opening delimiter.
 */
export function contentStartOf(raw: RawDocstring): Position {
    return movePosition(raw.start, { column: raw.delimiter.length });
}

/**
 * Splits a docstring body into positioned lines.
 * Line 0 shares the delimiter's line; every later line starts at column 1.
 *
 * @example
 * // """Summary.\n    More."""  opened at 3:5
 * splitLines(raw);
 * // [{ text: 'Summary.', position: 3:8 }, { text: '    More.', position: 4:1 }]
 */
export function splitLines(raw: RawDocstring): DocstringLine[] {
    const first = contentStartOf(raw);
    return raw.text.split('\n').map((text, index) => ({
        text,
        position: index === 0 ? first : { line: raw.start.line + index, column: 1 },
    }));
}

// ============================================================
// Line Predicates
// ============================================================

export function isBlank(line: DocstringLine): boolean {
    return line.text.trim() === '';
}

export function leadingWhitespace(text: string): number {
    return text.length - text.trimStart().length;
}

export function startsIndented(line: DocstringLine): boolean {
    return /^\s/.test(line.text);
}

/**
 * Position just past the last character of the line.
 */
export function lineEnd(line: DocstringLine): Position {
    return movePosition(line.position, { column: line.text.length });
}

/**
 * Position of the first non-whitespace character of the line.
 */
export function firstCharacter(line: DocstringLine): Position {
    return movePosition(line.position, { column: leadingWhitespace(line.text) });
}

/**
 * Strips up to `width` leading whitespace characters, keeping the position
 * pointed at the first remaining character.
 */
export function dedent(line: DocstringLine, width: number): DocstringLine {
    const removable = Math.min(width, leadingWhitespace(line.text));
    if (removable === 0) {
        return line;
    }
    return {
        text: line.text.slice(removable),
        position: movePosition(line.position, { column: removable }),
    };
}

// ============================================================
// Paragraphs
// ============================================================

/**
 * Builds a paragraph over `lines`; an empty paragraph sits at `fallback`.
 */
export function paragraphOf(lines: readonly DocstringLine[], fallback: Position): Paragraph {
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (first === undefined || last === undefined) {
        return { start: fallback, end: fallback, lines: [] };
    }
    return { start: first.position, end: lineEnd(last), lines };
}

/**
 * Joins the non-blank lines of a paragraph with single spaces.
 */
export function flatten(lines: readonly DocstringLine[]): string {
    return lines
        .map((line) => line.text.trim())
        .filter((text) => text !== '')
        .join(' ');
}

export function trimBlankEdges(lines: readonly DocstringLine[]): DocstringLine[] {
    let start = 0;
    let end = lines.length;
    while (start < end && isBlankAt(lines, start)) {
        start++;
    }
    while (end > start && isBlankAt(lines, end - 1)) {
        end--;
    }
    return lines.slice(start, end);
}

function isBlankAt(lines: readonly DocstringLine[], index: number): boolean {
    const line = lines[index];
    return line === undefined || isBlank(line);
}

/**
 * Number of blank lines before the first non-blank one.
 * Equals `lines.length` when every line is blank.
 */
export function countLeadingBlankLines(lines: readonly DocstringLine[]): number {
    const index = lines.findIndex((line) => !isBlank(line));
    return index === -1 ? lines.length : index;
}

/**
 * Number of blank lines after the last non-blank one.
 * Equals `lines.length` when every line is blank.
 */
export function countTrailingBlankLines(lines: readonly DocstringLine[]): number {
    let count = 0;
    for (let i = lines.length - 1; i >= 0 && isBlankAt(lines, i); i--) {
        count++;
    }
    return count;
}
