/**
 * @fileoverview Unit tests for the See Also parser.
 * @module test/unit/seeAlso
 */

import { describe, it, expect } from 'vitest';
import type { Diagnostic } from '../../src/types/lint.js';
import { parseSeeAlso } from '../../src/core/docstring/seeAlso.js';
import { linesAt } from '../helpers/fixtures.js';

describe('parseSeeAlso', () => {
    const body = linesAt(
        [
            '    numpy.sum : Sum of elements.',
            '    :func:`prod`, `cumsum`',
            '        Related products.',
            '    max,',
        ],
        20
    );

    it('splits entries and their names', () => {
        const entries = parseSeeAlso(body, 4, []);
        expect(entries.map((entry) => entry.names.map((name) => name.name.value))).toEqual([
            ['numpy.sum'],
            ['prod', 'cumsum'],
            ['max'],
        ]);
    });

    it('positions names inside backquotes and keeps roles', () => {
        const [, related] = parseSeeAlso(body, 4, []);
        expect(related?.names).toEqual([
            {
                name: { value: 'prod', start: { line: 21, column: 12 }, end: { line: 21, column: 16 } },
                role: 'func',
            },
            {
                name: { value: 'cumsum', start: { line: 21, column: 20 }, end: { line: 21, column: 26 } },
                role: null,
            },
        ]);
    });

    it('reads an inline description', () => {
        const [sum] = parseSeeAlso(body, 4, []);
        expect(sum?.description?.lines).toEqual([
            { text: 'Sum of elements.', position: { line: 20, column: 17 } },
        ]);
    });

    it('attaches indented lines to the previous entry', () => {
        const [, related, max] = parseSeeAlso(body, 4, []);
        expect(related?.description?.lines.map((line) => line.text)).toEqual([
            '    Related products.',
        ]);
        expect(max?.description).toBeNull();
    });

    it('reports a separator left after the last name', () => {
        const diagnostics: Diagnostic[] = [];
        parseSeeAlso(body, 4, diagnostics);
        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0]).toMatchObject({
            code: 'ER03',
            message: 'Unexpected comma or period after function list in `See Also`.',
            start: { line: 23, column: 8 },
            end: { line: 23, column: 9 },
        });
    });

    it('reports a period left after a bare or quoted name', () => {
        const diagnostics: Diagnostic[] = [];
        const entries = parseSeeAlso(linesAt(['numpy.dot.', '`numpy.vdot`.', 'numpy.dot,']), 0, diagnostics);
        expect(entries.map((entry) => entry.names.map((name) => name.name.value))).toEqual([
            ['numpy.dot'],
            ['numpy.vdot'],
            ['numpy.dot'],
        ]);
        expect(diagnostics.map((d) => [d.code, d.start, d.end])).toEqual([
            ['ER03', { line: 1, column: 10 }, { line: 1, column: 11 }],
            ['ER03', { line: 2, column: 13 }, { line: 2, column: 14 }],
            ['ER03', { line: 3, column: 10 }, { line: 3, column: 11 }],
        ]);
    });

    it('accepts the py domain in roles', () => {
        const [entry] = parseSeeAlso(linesAt([':py:meth:`Widget.draw` : Draw it.']), 0, []);
        expect(entry?.names[0]?.role).toBe('py:meth');
        expect(entry?.names[0]?.name.value).toBe('Widget.draw');
    });

    it('drops lines that match no entry', () => {
        expect(parseSeeAlso(linesAt(['!!!', '']), 0, [])).toEqual([]);
    });
});
