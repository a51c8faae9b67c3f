/**
 * @fileoverview Summary and extended summary parsing.
 *
 * @module core/docstring/summary
 */

import type { Position } from '../../types/base.js';
import type { Summary } from '../../types/docstring.js';
import { flatten, paragraphOf, trimBlankEdges } from './lines.js';
import type { LineReader } from './reader.js';

/**
 * A paragraph echoing a call signature, e.g. `Widget(name, size=3)` or
 * `out = render(doc)`. Class docstrings often repeat the constructor.
 */
const CALL_SIGNATURE = /^([\w., ]+=)?\s*[\w.]+\(.*\)$/;

/**
 * Reads the summary and the extended summary, leaving the reader at the
 * first section header or at EOF. Returns null when the docstring is blank
 * or opens with a section.
 */
export function parseSummary(reader: LineReader, contentStart: Position): Summary | null {
    reader.skipBlankLines();
    if (reader.eof() || reader.isAtSectionBoundary()) {
        return null;
    }

    let content = reader.readUntilBlankRun();
    reader.skipBlankLines();
    while (
        CALL_SIGNATURE.test(flatten(content)) &&
        !reader.eof() &&
        !reader.isAtSectionBoundary()
    ) {
        content = reader.readUntilBlankRun();
        reader.skipBlankLines();
    }

    const summary = paragraphOf(content, contentStart);

    if (reader.eof() || reader.isAtSectionBoundary()) {
        return { content: summary, extendedContent: null };
    }

    const extended = trimBlankEdges(reader.readUntilNextSectionBoundary());
    return {
        content: summary,
        extendedContent: extended.length === 0 ? null : paragraphOf(extended, summary.end),
    };
}

