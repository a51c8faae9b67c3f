/**
 * @fileoverview Component tests running whole declarations through the
 * validator with a narrowed selection, one behaviour per scenario.
 *
 * @module test/component/scenarios
 */

import { describe, it, expect } from 'vitest';
import type { Declaration } from '../../src/types/declaration.js';
import type { Diagnostic } from '../../src/types/lint.js';
import { createLintContext, validateDeclaration } from '../../src/core/linter/validator.js';
import { getDefault } from '../../src/state/config.js';
import {
    functionDeclaration,
    functionSource,
    moduleDeclaration,
} from '../helpers/fixtures.js';

function lint(declaration: Declaration, select: string[]): Diagnostic[] {
    return validateDeclaration(declaration, createLintContext({ ...getDefault(), select }));
}

describe('docstring layout', () => {
    it('accepts a one-line docstring', () => {
        expect(lint(moduleDeclaration('"""Test"""'), ['GL01', 'GL02'])).toEqual([]);
    });

    it('flags text right after the opening delimiter of a multi-line docstring', () => {
        const diagnostics = lint(moduleDeclaration('"""Test\n\nExtended summary.\n"""'), ['GL01', 'GL02']);
        expect(diagnostics).toEqual([
            {
                code: 'GL01',
                message: 'Docstring should start on a new line.',
                start: { line: 1, column: 4 },
                end: { line: 1, column: 4 },
                suggestion: 'Move the text to the line after the opening quotes.',
                terminates: false,
            },
        ]);
    });
});

describe('sections', () => {
    it('reports an unknown section next to a known one', () => {
        const declaration = functionDeclaration(
            functionSource('def f():', [
                '    Summary.',
                '',
                '    Invalid',
                '    -------',
                '    Text.',
                '',
                '    Examples',
                '    --------',
                '    >>> f()',
            ])
        );
        expect(lint(declaration, ['GL06'])).toEqual([
            {
                code: 'GL06',
                message: 'Docstring contains unexpected section `Invalid`.',
                start: { line: 5, column: 5 },
                end: { line: 5, column: 12 },
                suggestion: 'Remove section or fix spelling.',
                terminates: false,
            },
        ]);
    });

    it('reports only SS01 among summary checks when the docstring opens with a section', () => {
        const declaration = functionDeclaration(
            functionSource('def f():', ['    Notes', '    -----', '    Text.'])
        );
        const diagnostics = lint(declaration, ['SS', 'ES']);
        expect(diagnostics.map((d) => [d.code, d.start, d.end])).toEqual([
            ['SS01', { line: 2, column: 5 }, { line: 2, column: 8 }],
        ]);
    });
});

describe('parameters', () => {
    it('reports the one undocumented parameter at its declaration', () => {
        const declaration = functionDeclaration(
            functionSource('def f(p, x, y):', [
                '    Summary.',
                '',
                '    Parameters',
                '    ----------',
                '    p : int',
                '        P.',
                '    x : int',
                '        X.',
            ])
        );
        const diagnostics = lint(declaration, ['PR01']);
        expect(diagnostics.map((d) => [d.message, d.start, d.end])).toEqual([
            ['Parameter `y` should be documented.', { line: 1, column: 13 }, { line: 1, column: 14 }],
        ]);
    });

    it('reports every parameter when there is no Parameters section', () => {
        const declaration = functionDeclaration(functionSource('def f(p, x, y):', ['    Summary.']));
        expect(lint(declaration, ['PR01']).map((d) => d.start.column)).toEqual([7, 10, 13]);
    });

    it('points at the end of a type ending with a period', () => {
        const declaration = functionDeclaration(
            functionSource('def f(aaa):', [
                '    Summary.',
                '',
                '    Parameters',
                '    ----------',
                '    aaa : int.',
                '        Value.',
            ])
        );
        const diagnostics = lint(declaration, ['PR05']);
        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0]?.start).toEqual({ line: 7, column: 15 });
        expect(diagnostics[0]?.end).toEqual({ line: 7, column: 15 });
    });
});

describe('deprecation warnings', () => {
    it('reports only the duplicate when the first warning opens the extended summary', () => {
        const declaration = functionDeclaration(
            functionSource('def f():', [
                '    Summary.',
                '',
                '    .. deprecated:: 1.0',
                '        Use g instead.',
                '    .. deprecated:: 2.0',
            ])
        );
        expect(lint(declaration, ['GL'])).toEqual([
            {
                code: 'GL11',
                message: 'Summary should only contain a single deprecation warning.',
                start: { line: 7, column: 5 },
                end: { line: 7, column: 20 },
                suggestion: 'Remove duplicate deprecation warnings on line 7.',
                terminates: false,
            },
        ]);
    });
});
