/**
 * @fileoverview Parser for the `See Also` section.
 *
 * Each entry line is a comma-separated list of references, each either a
 * bare dotted name or a backquoted name with an optional Sphinx role,
 * optionally followed by `: description`:
 *
 *     numpy.dot, :func:`numpy.vdot` : Dot products.
 *
 * @module core/docstring/seeAlso
 */

import type { Diagnostic } from '../../types/lint.js';
import type { DocstringLine, SeeAlsoEntry, SeeAlsoName } from '../../types/docstring.js';
import { movePosition } from '../../utils/position.js';
import { createDiagnostic } from '../catalog.js';
import { dedent, isBlank, leadingWhitespace, paragraphOf, startsIndented } from './lines.js';

// ============================================================
// Patterns
// ============================================================

const ROLE_REFERENCE = /:((?:py:)?\w+):`((?:~\w+\.)?[\w.-]+)`/y;
const QUOTED_REFERENCE = /`((?:~\w+\.)?[\w.-]+)`/y;
const PLAIN_REFERENCE = /[\w.-]*[\w-]/y;
const SEPARATOR = /,\s+/y;
const DESCRIPTION = /^\s*:(?:\s+(\S.*?))?\s*$/;

// ============================================================
// Line Grammar
// ============================================================

interface MatchedReference {
    readonly value: string;
    readonly role: string | null;
    /** Offset of the name itself, inside backquotes when quoted */
    readonly start: number;
    /** Offset just past the whole reference */
    readonly next: number;
}

interface MatchedLine {
    readonly references: readonly MatchedReference[];
    /** Offset of a `,` or `.` directly after the list, if any */
    readonly trailing: number | null;
    readonly description: { readonly text: string; readonly start: number } | null;
}

function matchReference(text: string, offset: number): MatchedReference | null {
    ROLE_REFERENCE.lastIndex = offset;
    const role = ROLE_REFERENCE.exec(text);
    if (role !== null) {
        const name = role[2] ?? '';
        return {
            value: name,
            role: role[1] ?? null,
            start: ROLE_REFERENCE.lastIndex - name.length - 1,
            next: ROLE_REFERENCE.lastIndex,
        };
    }

    QUOTED_REFERENCE.lastIndex = offset;
    const quoted = QUOTED_REFERENCE.exec(text);
    if (quoted !== null) {
        const name = quoted[1] ?? '';
        return { value: name, role: null, start: offset + 1, next: QUOTED_REFERENCE.lastIndex };
    }

    PLAIN_REFERENCE.lastIndex = offset;
    const plain = PLAIN_REFERENCE.exec(text);
    if (plain !== null) {
        return { value: plain[0], role: null, start: offset, next: PLAIN_REFERENCE.lastIndex };
    }

    return null;
}

function matchLine(text: string): MatchedLine | null {
    const first = matchReference(text, leadingWhitespace(text));
    if (first === null) {
        return null;
    }

    const references = [first];
    let offset = first.next;
    for (;;) {
        SEPARATOR.lastIndex = offset;
        if (SEPARATOR.exec(text) === null) {
            break;
        }
        const reference = matchReference(text, SEPARATOR.lastIndex);
        if (reference === null) {
            break;
        }
        references.push(reference);
        offset = reference.next;
    }

    let trailing: number | null = null;
    const ch = text.charAt(offset);
    if (ch === ',' || ch === '.') {
        trailing = offset;
        offset++;
    }

    const rest = text.slice(offset);
    if (rest.trim() === '') {
        return { references, trailing, description: null };
    }

    const match = DESCRIPTION.exec(rest);
    if (match === null) {
        return null;
    }
    const description = match[1];
    if (description === undefined) {
        return { references, trailing, description: null };
    }
    return {
        references,
        trailing,
        description: { text: description, start: offset + rest.indexOf(description, rest.indexOf(':') + 1) },
    };
}

// ============================================================
// Section Parser
// ============================================================

interface PendingEntry {
    readonly names: readonly SeeAlsoName[];
    readonly description: DocstringLine[];
}

/**
 * Parses a See Also body. Lines that neither match the reference grammar
 * nor continue a previous entry are dropped.
 */
export function parseSeeAlso(
    body: readonly DocstringLine[],
    indent: number,
    diagnostics: Diagnostic[]
): SeeAlsoEntry[] {
    const entries: PendingEntry[] = [];

    for (const line of body.map((raw) => dedent(raw, indent))) {
        if (isBlank(line)) {
            continue;
        }

        const matched = matchLine(line.text);
        const current = entries[entries.length - 1];

        if (current !== undefined && startsIndented(line) && (matched === null || matched.description === null)) {
            current.description.push(line);
            continue;
        }
        if (matched === null) {
            continue;
        }

        if (matched.trailing !== null && matched.description === null) {
            const at = movePosition(line.position, { column: matched.trailing });
            diagnostics.push(
                createDiagnostic('ER03', { start: at, end: movePosition(at, { column: 1 }) })
            );
        }

        entries.push({
            names: matched.references.map((reference) => {
                const start = movePosition(line.position, { column: reference.start });
                return {
                    name: {
                        value: reference.value,
                        start,
                        end: movePosition(start, { column: reference.value.length }),
                    },
                    role: reference.role,
                };
            }),
            description:
                matched.description === null
                    ? []
                    : [
                          {
                              text: matched.description.text,
                              position: movePosition(line.position, {
                                  column: matched.description.start,
                              }),
                          },
                      ],
        });
    }

    return entries.map((entry) => {
        const first = entry.names[0];
        return {
            names: entry.names,
            description:
                entry.description.length === 0 || first === undefined
                    ? null
                    : paragraphOf(entry.description, first.name.end),
        };
    });
}
