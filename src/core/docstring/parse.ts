/**
 * @fileoverview Docstring assembly: splits the raw text into positioned
 * lines and runs the summary and section parsers over them.
 *
 * @module core/docstring/parse
 */

import type { DocString, RawDocstring } from '../../types/docstring.js';
import type { Diagnostic } from '../../types/lint.js';
import { contentStartOf, splitLines } from './lines.js';
import { LineReader } from './reader.js';
import { parseSections } from './sections.js';
import { parseSummary } from './summary.js';

export interface ParseResult {
    readonly docstring: DocString;
    /** Layout defects found while parsing (ER01-ER03) */
    readonly diagnostics: readonly Diagnostic[];
}

/**
 * Parses a raw docstring. Never throws on malformed text; defects are
 * returned as diagnostics.
 *
 * @example
 * const { docstring, diagnostics } = parseDocstring({
 *     text: 'Add two numbers.\n\n    Parameters\n    ----------\n    a : int\n        First.\n    ',
 *     start: { line: 2, column: 5 },
 *     end: { line: 8, column: 8 },
 *     indent: 4,
 *     delimiter: '"""',
 * });
 * docstring.sections.get('Parameters');
 */
export function parseDocstring(raw: RawDocstring): ParseResult {
    const lines = splitLines(raw);
    const contentStart = contentStartOf(raw);
    const reader = new LineReader(lines);
    const diagnostics: Diagnostic[] = [];

    const summary = parseSummary(reader, contentStart);
    const sections = parseSections(reader, raw.indent, diagnostics);

    return {
        docstring: {
            start: raw.start,
            end: raw.end,
            contentStart,
            indent: raw.indent,
            raw: raw.text,
            lines,
            summary,
            sections,
        },
        diagnostics,
    };
}
