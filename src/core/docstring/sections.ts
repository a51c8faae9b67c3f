/**
 * @fileoverview Section segmentation and dispatch by section name.
 *
 * @module core/docstring/sections
 */

import type { Diagnostic } from '../../types/lint.js';
import type { DocstringLine, Section, SectionContents, Token } from '../../types/docstring.js';
import { movePosition } from '../../utils/position.js';
import { createDiagnostic } from '../catalog.js';
import { isBlank, leadingWhitespace, lineEnd, paragraphOf, trimBlankEdges } from './lines.js';
import { parseParameterList } from './parameters.js';
import type { LineReader } from './reader.js';
import { isIndexDirective } from './reader.js';
import { parseSeeAlso } from './seeAlso.js';

// ============================================================
// Section Taxonomy
// ============================================================

const PARAMETER_SECTIONS: ReadonlySet<string> = new Set([
    'Parameters',
    'Other Parameters',
    'Attributes',
    'Methods',
]);

const TYPED_SECTIONS: ReadonlySet<string> = new Set([
    'Returns',
    'Yields',
    'Raises',
    'Warns',
    'Receives',
]);

const SEE_ALSO = 'See Also';

/** Name under which the `.. index::` pseudo-section is stored */
export const INDEX_SECTION = 'index';

// ============================================================
// Parsing
// ============================================================

/**
 * Reads sections until EOF. The reader must stand at a section header (or
 * before blank lines leading to one).
 *
 * Recoverable layout defects are appended to `diagnostics`: a header not
 * preceded by a blank line (ER01) and an underline whose length differs
 * from the header (ER02).
 */
export function parseSections(
    reader: LineReader,
    indent: number,
    diagnostics: Diagnostic[]
): Map<string, Section> {
    const sections = new Map<string, Section>();

    for (;;) {
        reader.skipBlankLines();
        const previous = reader.previous();
        const header = reader.read();
        if (header === null) {
            break;
        }

        const directive = isIndexDirective(header.text);
        if (previous !== null && !isBlank(previous)) {
            const token = headerToken(header);
            diagnostics.push(
                createDiagnostic('ER01', {
                    start: token.start,
                    end: token.end,
                    args: { section: directive ? INDEX_SECTION : token.value },
                    suggestion: 'Insert a blank line before the section.',
                })
            );
        }

        const section = directive
            ? parseDirective(reader, header)
            : parseSection(reader, header, indent, diagnostics);

        if (!sections.has(section.name.value)) {
            sections.set(section.name.value, section);
        }
    }

    return sections;
}

function parseSection(
    reader: LineReader,
    header: DocstringLine,
    indent: number,
    diagnostics: Diagnostic[]
): Section {
    const name = headerToken(header);

    reader.skipBlankLines();
    const underline = reader.read();
    let validUnderline = false;

    if (underline !== null) {
        const mark = underline.text.trim();
        validUnderline = mark.length === name.value.length;
        if (!validUnderline) {
            const start = movePosition(underline.position, {
                column: leadingWhitespace(underline.text),
            });
            diagnostics.push(
                createDiagnostic('ER02', {
                    start,
                    end: movePosition(start, { column: mark.length }),
                    args: { section: name.value },
                    suggestion: `Use \`${(mark.charAt(0) || '-').repeat(name.value.length)}\`.`,
                })
            );
        }
    }

    const body = reader.readUntilNextSectionBoundary();
    const bodyStart = underline === null ? name.end : lineEnd(underline);
    const span = paragraphOf(body, bodyStart);

    return {
        name,
        validUnderline,
        directive: false,
        contents: parseContents(name.value, body, indent, diagnostics),
        start: span.start,
        end: span.end,
    };
}

function parseDirective(reader: LineReader, header: DocstringLine): Section {
    const token = headerToken(header);
    const body = reader.readUntilNextSectionBoundary();
    const span = paragraphOf(body, token.end);

    return {
        name: { ...token, value: INDEX_SECTION },
        validUnderline: true,
        directive: true,
        contents: { kind: 'text', lines: trimBlankEdges(body) },
        start: span.start,
        end: span.end,
    };
}

function parseContents(
    name: string,
    body: readonly DocstringLine[],
    indent: number,
    diagnostics: Diagnostic[]
): SectionContents {
    if (PARAMETER_SECTIONS.has(name)) {
        return { kind: 'parameters', entries: parseParameterList(body, indent, false) };
    }
    if (TYPED_SECTIONS.has(name)) {
        return { kind: 'parameters', entries: parseParameterList(body, indent, true) };
    }
    if (name === SEE_ALSO) {
        return { kind: 'see-also', entries: parseSeeAlso(body, indent, diagnostics) };
    }
    return { kind: 'text', lines: trimBlankEdges(body) };
}

function headerToken(header: DocstringLine): Token {
    const value = header.text.trim();
    const start = movePosition(header.position, { column: leadingWhitespace(header.text) });
    return { value, start, end: movePosition(start, { column: value.length }) };
}
