/**
 * @fileoverview Whole-docstring checks: blank-line layout, tabs, section
 * names and order, deprecation markers, version directives, Examples.
 *
 * @module core/linter/checks/global
 */

import type { Span } from '../../../types/base.js';
import type { DocString, DocstringLine } from '../../../types/docstring.js';
import type { Check, Diagnostic } from '../../../types/lint.js';
import { movePosition } from '../../../utils/position.js';
import { createDiagnostic } from '../../catalog.js';
import {
    countLeadingBlankLines,
    countTrailingBlankLines,
    firstCharacter,
    isBlank,
    lineEnd,
} from '../../docstring/lines.js';

// ============================================================
// Constants
// ============================================================

/**
 * Known section names, in the order they should appear.
 */
export const ALLOWED_SECTIONS: readonly string[] = [
    'Parameters',
    'Attributes',
    'Methods',
    'Returns',
    'Yields',
    'Receives',
    'Other Parameters',
    'Raises',
    'Warns',
    'Warnings',
    'See Also',
    'Notes',
    'References',
    'Examples',
];

const DEPRECATION_MARKER = '.. deprecated::';

const MALFORMED_DIRECTIVE = /^(\s*)\.\. (versionadded|versionchanged|deprecated)(?!::)/i;

// ============================================================
// Helpers
// ============================================================

/**
 * Anchor for problems with the docstring as a whole: its opening delimiter.
 */
export function docstringAnchor(docstring: DocString): Span {
    return { start: docstring.start, end: docstring.contentStart };
}

function deprecationMarkers(docstring: DocString): Span[] {
    const summary = docstring.summary;
    if (summary === null) {
        return [];
    }
    const lines: DocstringLine[] = [
        ...summary.content.lines,
        ...(summary.extendedContent?.lines ?? []),
    ];
    return lines
        .filter((line) => line.text.trimStart().startsWith(DEPRECATION_MARKER))
        .map((line) => {
            const start = firstCharacter(line);
            return { start, end: movePosition(start, { column: DEPRECATION_MARKER.length }) };
        });
}

/**
 * First line of the paragraph a deprecation marker should open.
 */
function deprecationLine(docstring: DocString): number | null {
    const summary = docstring.summary;
    if (summary === null) {
        return null;
    }
    return (summary.extendedContent ?? summary.content).start.line;
}

// ============================================================
// Checks
// ============================================================

export const GL01: Check = {
    id: 'GL01',
    description: 'Multi-line docstrings start with one blank line after the opening quotes.',
    validate(_declaration, docstring) {
        const lines = docstring.lines;
        const leading = countLeadingBlankLines(lines);
        const first = lines[leading];
        if (lines.length < 2 || leading === 1 || first === undefined) {
            return [];
        }
        return [
            createDiagnostic('GL01', {
                start: firstCharacter(first),
                suggestion:
                    leading === 0
                        ? 'Move the text to the line after the opening quotes.'
                        : 'Remove empty lines after the opening quotes.',
            }),
        ];
    },
};

export const GL02: Check = {
    id: 'GL02',
    description: 'Multi-line docstrings end with one blank line before the closing quotes.',
    validate(_declaration, docstring) {
        const lines = docstring.lines;
        const last = lines[lines.length - 1];
        if (lines.length < 2 || last === undefined || countTrailingBlankLines(lines) === 1) {
            return [];
        }
        return [
            createDiagnostic('GL02', {
                start: lineEnd(last),
                suggestion: isBlank(last)
                    ? 'Remove empty line.'
                    : 'Put the closing quotes on their own line.',
            }),
        ];
    },
};

export const GL03: Check = {
    id: 'GL03',
    description: 'No two consecutive blank lines, except before the closing quotes.',
    validate(_declaration, docstring) {
        const lines = docstring.lines;
        const diagnostics: Diagnostic[] = [];
        for (let i = 1; i < lines.length - 1; i++) {
            const previous = lines[i - 1];
            const line = lines[i];
            if (previous !== undefined && line !== undefined && isBlank(previous) && isBlank(line)) {
                diagnostics.push(
                    createDiagnostic('GL03', {
                        start: line.position,
                        suggestion: 'Remove empty line.',
                    })
                );
            }
        }
        return diagnostics;
    },
};

export const GL05: Check = {
    id: 'GL05',
    description: 'No line starts with a tab.',
    validate(_declaration, docstring) {
        return docstring.lines.flatMap((line) => {
            const tabs = /^\t+/.exec(line.text);
            if (tabs === null) {
                return [];
            }
            return [
                createDiagnostic('GL05', {
                    start: line.position,
                    end: movePosition(line.position, { column: tabs[0].length }),
                    suggestion: 'Indent with spaces.',
                }),
            ];
        });
    },
};

export const GL06: Check = {
    id: 'GL06',
    description: 'Every section name is a known numpydoc section.',
    validate(_declaration, docstring) {
        return [...docstring.sections.values()]
            .filter((section) => !section.directive && !ALLOWED_SECTIONS.includes(section.name.value))
            .map((section) =>
                createDiagnostic('GL06', {
                    start: section.name.start,
                    end: section.name.end,
                    args: { section: section.name.value },
                    suggestion: 'Remove section or fix spelling.',
                })
            );
    },
};

/**
 * Pairs the known sections as found with the same sections in canonical
 * order, position by position.
 */
export const GL07: Check = {
    id: 'GL07',
    description: 'Known sections appear in canonical order.',
    validate(_declaration, docstring) {
        const expected = ALLOWED_SECTIONS.filter((name) => docstring.sections.has(name));
        const actual = [...docstring.sections.values()].filter(
            (section) => !section.directive && ALLOWED_SECTIONS.includes(section.name.value)
        );
        const diagnostics: Diagnostic[] = [];
        const count = Math.min(expected.length, actual.length);
        for (let i = 0; i < count; i++) {
            const want = expected[i];
            const section = actual[i];
            if (want !== undefined && section !== undefined && want !== section.name.value) {
                diagnostics.push(
                    createDiagnostic('GL07', {
                        start: section.name.start,
                        end: section.name.end,
                        suggestion: `Section should be \`${want}\`.`,
                    })
                );
            }
        }
        return diagnostics;
    },
};

export const GL09: Check = {
    id: 'GL09',
    description: 'A deprecation warning opens the extended summary.',
    validate(_declaration, docstring) {
        const [first] = deprecationMarkers(docstring);
        const line = deprecationLine(docstring);
        if (first === undefined || line === null || first.start.line === line) {
            return [];
        }
        return [
            createDiagnostic('GL09', {
                start: first.start,
                end: first.end,
                suggestion: `Move deprecation warning to line ${line}.`,
            }),
        ];
    },
};

export const GL10: Check = {
    id: 'GL10',
    description: 'Version directives are followed by `::`.',
    validate(_declaration, docstring) {
        return docstring.lines.flatMap((line) => {
            const match = MALFORMED_DIRECTIVE.exec(line.text);
            if (match === null) {
                return [];
            }
            const indent = match[1] ?? '';
            const directive = match[2] ?? '';
            const start = movePosition(line.position, { column: indent.length + 3 });
            return [
                createDiagnostic('GL10', {
                    start,
                    end: movePosition(start, { column: directive.length }),
                    suggestion: 'Fix the directive by inserting `::`.',
                }),
            ];
        });
    },
};

export const GL11: Check = {
    id: 'GL11',
    description: 'The summary holds at most one deprecation warning.',
    validate(_declaration, docstring) {
        const [, ...duplicates] = deprecationMarkers(docstring);
        const lines = duplicates.map((marker) => marker.start.line);
        const where =
            lines.length === 1
                ? `line ${lines.join('')}`
                : `lines ${lines.slice(0, -1).join(', ')} and ${lines[lines.length - 1] ?? ''}`;
        return duplicates.map((marker) =>
            createDiagnostic('GL11', {
                start: marker.start,
                end: marker.end,
                suggestion: `Remove duplicate deprecation warnings on ${where}.`,
            })
        );
    },
};

export const EX01: Check = {
    id: 'EX01',
    description: 'The docstring has an Examples section.',
    validate(_declaration, docstring) {
        if (docstring.sections.has('Examples')) {
            return [];
        }
        return [
            createDiagnostic('EX01', {
                ...docstringAnchor(docstring),
                suggestion: 'Add an Examples section.',
            }),
        ];
    },
};
