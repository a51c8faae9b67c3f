/**
 * @fileoverview Summary line checks (SS01-SS06) and the extended summary
 * check (ES01). Only SS01 reports on a docstring without a summary.
 *
 * @module core/linter/checks/summary
 */

import type { DocString, DocstringLine } from '../../../types/docstring.js';
import type { Check } from '../../../types/lint.js';
import { movePosition } from '../../../utils/position.js';
import { createDiagnostic } from '../../catalog.js';
import { isCallable } from '../../declaration.js';
import { firstCharacter, leadingWhitespace } from '../../docstring/lines.js';
import { startsLowercase } from '../description.js';
import { docstringAnchor } from './global.js';

function firstSummaryLine(docstring: DocString): DocstringLine | null {
    return docstring.summary?.content.lines[0] ?? null;
}

function lastSummaryLine(docstring: DocString): DocstringLine | null {
    const lines = docstring.summary?.content.lines ?? [];
    return lines[lines.length - 1] ?? null;
}

export const SS01: Check = {
    id: 'SS01',
    description: 'The docstring has a summary.',
    validate(_declaration, docstring) {
        if (docstring.summary !== null) {
            return [];
        }
        return [
            createDiagnostic('SS01', {
                ...docstringAnchor(docstring),
                suggestion: 'Add a short summary in a single line.',
            }),
        ];
    },
};

export const SS02: Check = {
    id: 'SS02',
    description: 'The summary starts with a capital letter.',
    validate(_declaration, docstring) {
        const line = firstSummaryLine(docstring);
        if (line === null || !startsLowercase(line.text)) {
            return [];
        }
        const start = firstCharacter(line);
        const letter = line.text.trimStart().charAt(0);
        return [
            createDiagnostic('SS02', {
                start,
                end: movePosition(start, { column: 1 }),
                suggestion: `Replace \`${letter}\` with \`${letter.toUpperCase()}\`.`,
            }),
        ];
    },
};

export const SS03: Check = {
    id: 'SS03',
    description: 'The summary ends with a period.',
    validate(_declaration, docstring) {
        const line = lastSummaryLine(docstring);
        const text = line?.text.trimEnd() ?? '';
        if (line === null || text.endsWith('.')) {
            return [];
        }
        return [
            createDiagnostic('SS03', {
                start: movePosition(line.position, { column: text.length }),
                suggestion: 'Insert a period.',
            }),
        ];
    },
};

/**
 * The delimiter line needs no indentation; later lines carry the base
 * indentation of the declaration body.
 */
export const SS04: Check = {
    id: 'SS04',
    description: 'The summary has no leading whitespace beyond the base indentation.',
    validate(_declaration, docstring) {
        const line = firstSummaryLine(docstring);
        if (line === null) {
            return [];
        }
        const expected = line.position.line === docstring.contentStart.line ? 0 : docstring.indent;
        const actual = leadingWhitespace(line.text);
        if (actual <= expected) {
            return [];
        }
        return [
            createDiagnostic('SS04', {
                start: movePosition(line.position, { column: expected }),
                end: movePosition(line.position, { column: actual }),
                suggestion: 'Remove leading whitespace.',
            }),
        ];
    },
};

/**
 * Approximate: any first word ending in `s` is taken for a third-person verb.
 */
export const SS05: Check = {
    id: 'SS05',
    description: 'Function summaries start with an infinitive verb.',
    validate(declaration, docstring) {
        const line = firstSummaryLine(docstring);
        if (line === null || !isCallable(declaration)) {
            return [];
        }
        const match = /^(\s*)(\S+)\s/.exec(line.text);
        const indent = match?.[1] ?? '';
        const word = match?.[2] ?? '';
        if (!word.endsWith('s')) {
            return [];
        }
        const start = movePosition(line.position, { column: indent.length });
        return [
            createDiagnostic('SS05', {
                start,
                end: movePosition(start, { column: word.length }),
                suggestion: 'Remove third person `s`.',
            }),
        ];
    },
};

export const SS06: Check = {
    id: 'SS06',
    description: 'The summary fits on one line.',
    validate(_declaration, docstring) {
        const content = docstring.summary?.content;
        if (content === undefined || content.lines.length <= 1) {
            return [];
        }
        return [
            createDiagnostic('SS06', {
                start: content.start,
                end: content.end,
                suggestion: 'Move the remaining text to the extended summary.',
            }),
        ];
    },
};

export const ES01: Check = {
    id: 'ES01',
    description: 'The summary is followed by an extended summary.',
    validate(_declaration, docstring) {
        if (docstring.summary === null || docstring.summary.extendedContent !== null) {
            return [];
        }
        return [
            createDiagnostic('ES01', {
                ...docstringAnchor(docstring),
                suggestion: 'Add an extended summary after the summary line.',
            }),
        ];
    },
};
