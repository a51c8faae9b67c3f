/**
 * @fileoverview Cursor over the positioned lines of a docstring.
 * Knows where sections start; everything else is up to the parsers.
 *
 * @module core/docstring/reader
 */

import type { DocstringLine } from '../../types/docstring.js';
import { isBlank } from './lines.js';

// ============================================================
// Constants
// ============================================================

const UNDERLINE = /^(-+|=+)$/;

const INDEX_DIRECTIVE = '.. index::';

/**
 * True for the `.. index::` pseudo-section header.
 */
export function isIndexDirective(text: string): boolean {
    return text.trimStart().startsWith(INDEX_DIRECTIVE);
}

export function isUnderline(text: string): boolean {
    return UNDERLINE.test(text.trim());
}

// ============================================================
// Line Reader
// ============================================================

/**
 * Forward-only cursor with bounded lookahead.
 *
 * @example
 * const reader = new LineReader(lines);
 * reader.skipBlankLines();
 * if (!reader.isAtSectionBoundary()) {
 *     const summary = reader.readUntilBlankRun();
 * }
 */
export class LineReader {
    private index = 0;

    constructor(private readonly lines: readonly DocstringLine[]) {}

    eof(): boolean {
        return this.index >= this.lines.length;
    }

    /**
     * The line `offset` lines away from the cursor, or null outside the docstring.
     */
    peek(offset = 0): DocstringLine | null {
        return this.lines[this.index + offset] ?? null;
    }

    /**
     * The line just behind the cursor.
     */
    previous(): DocstringLine | null {
        return this.peek(-1);
    }

    /**
     * Returns the current line and advances, or null at EOF.
     */
    read(): DocstringLine | null {
        const line = this.peek();
        if (line !== null) {
            this.index++;
        }
        return line;
    }

    readWhile(predicate: (line: DocstringLine) => boolean): DocstringLine[] {
        const result: DocstringLine[] = [];
        let line = this.peek();
        while (line !== null && predicate(line)) {
            result.push(line);
            this.index++;
            line = this.peek();
        }
        return result;
    }

    skipBlankLines(): void {
        this.readWhile(isBlank);
    }

    /**
     * Reads the current line and every following line up to a blank line
     * or a section header.
     */
    readUntilBlankRun(): DocstringLine[] {
        const first = this.read();
        if (first === null) {
            return [];
        }
        return [first, ...this.readWhile((line) => !isBlank(line) && !this.isAtSectionBoundary())];
    }

    /**
     * Reads up to (not including) the next section header, or to EOF.
     */
    readUntilNextSectionBoundary(): DocstringLine[] {
        return this.readWhile(() => !this.isAtSectionBoundary());
    }

    /**
     * A non-blank line opens a section when the next non-blank line is made
     * only of `-` or only of `=`, or when it is an `.. index::` directive.
     * Underline length is not part of the test.
     */
    isAtSectionBoundary(): boolean {
        const header = this.peek();
        if (header === null || isBlank(header)) {
            return false;
        }
        if (isIndexDirective(header.text)) {
            return true;
        }
        const underline = this.nextNonBlank(1);
        return underline !== null && isUnderline(underline.text);
    }

    private nextNonBlank(offset: number): DocstringLine | null {
        for (let line = this.peek(offset); line !== null; line = this.peek(++offset)) {
            if (!isBlank(line)) {
                return line;
            }
        }
        return null;
    }
}
