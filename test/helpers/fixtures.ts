/**
 * @fileoverview Builders for raw docstrings and declarations from inline
 * source text. Positions are derived from the text, so fixtures read like
 * the code they stand for.
 *
 * @module test/helpers/fixtures
 */

import type { Position } from '../../src/types/base.js';
import type {
    ClassDeclaration,
    Declaration,
    DeclaredParameter,
    FunctionDeclaration,
    MethodDeclaration,
    ModuleDeclaration,
} from '../../src/types/declaration.js';
import type { DocString, DocstringLine, RawDocstring } from '../../src/types/docstring.js';
import type { Check, Diagnostic } from '../../src/types/lint.js';
import { parseDocstring } from '../../src/core/docstring/parse.js';

const DELIMITER = '"""';

// ============================================================
// Positions
// ============================================================

/**
 * 1-based position of a 0-based offset into `source`.
 */
export function positionAt(source: string, offset: number): Position {
    const before = source.slice(0, offset);
    return {
        line: before.split('\n').length,
        column: offset - before.lastIndexOf('\n'),
    };
}

/**
 * Lines positioned at column 1 of consecutive source lines.
 */
export function linesAt(texts: readonly string[], firstLine = 1): DocstringLine[] {
    return texts.map((text, index) => ({
        text,
        position: { line: firstLine + index, column: 1 },
    }));
}

// ============================================================
// Docstrings
// ============================================================

/**
 * Extracts the first triple-quoted docstring of `source`. The base indent
 * is the column of the opening delimiter.
 */
export function rawDocstring(source: string): RawDocstring {
    const open = source.indexOf(DELIMITER);
    const close = source.indexOf(DELIMITER, open + DELIMITER.length);
    if (open === -1 || close === -1) {
        throw new Error('Fixture has no complete docstring');
    }
    const prefixed = source.charAt(open - 1) === 'r';
    const start = positionAt(source, prefixed ? open - 1 : open);
    return {
        text: source.slice(open + DELIMITER.length, close),
        start,
        end: positionAt(source, close + DELIMITER.length),
        indent: start.column - 1,
        delimiter: prefixed ? `r${DELIMITER}` : DELIMITER,
    };
}

export function parsed(source: string): DocString {
    return parseDocstring(rawDocstring(source)).docstring;
}

/**
 * Joins a `def` line, an indented docstring and nothing else. Body lines
 * start on line 3.
 */
export function functionSource(signature: string, body: readonly string[]): string {
    return [signature, '    """', ...body, '    """'].join('\n');
}

// ============================================================
// Declarations
// ============================================================

/**
 * Parameters named between the parentheses of a one-line signature,
 * `self` excluded. Spans cover the name with its stars.
 */
export function parametersOf(
    signature: string,
    annotations: Readonly<Record<string, string>> = {}
): DeclaredParameter[] {
    const open = signature.indexOf('(');
    const close = signature.lastIndexOf(')');
    const parameters: DeclaredParameter[] = [];
    let offset = open + 1;

    for (const part of signature.slice(open + 1, close).split(',')) {
        const text = part.trim();
        const column = offset + (part.length - part.trimStart().length) + 1;
        offset += part.length + 1;
        if (text === '' || text === 'self') {
            continue;
        }
        const stars = text.startsWith('**') ? 2 : text.startsWith('*') ? 1 : 0;
        const name = text.slice(stars);
        parameters.push({
            name,
            start: { line: 1, column },
            end: { line: 1, column: column + text.length },
            default: null,
            annotation: annotations[name] ?? null,
            arity: stars === 2 ? 'kwargs' : stars === 1 ? 'varargs' : 'positional',
        });
    }

    return parameters;
}

function span(source: string): { start: Position; end: Position } {
    return { start: { line: 1, column: 1 }, end: positionAt(source, source.length) };
}

function docstringOf(source: string): RawDocstring | null {
    return source.includes(DELIMITER) ? rawDocstring(source) : null;
}

function signatureOf(source: string): string {
    return source.split('\n')[0] ?? '';
}

export function functionDeclaration(
    source: string,
    overrides: Partial<Omit<FunctionDeclaration, 'kind'>> = {}
): FunctionDeclaration {
    const signature = signatureOf(source);
    return {
        kind: 'function',
        name: /def (\w+)/.exec(signature)?.[1] ?? 'f',
        parameters: parametersOf(signature),
        returns: 0,
        yields: 0,
        raises: 0,
        docstring: docstringOf(source),
        noqa: [],
        ...span(source),
        ...overrides,
    };
}

export function methodDeclaration(
    source: string,
    overrides: Partial<Omit<MethodDeclaration, 'kind'>> = {}
): MethodDeclaration {
    return { ...functionDeclaration(source), ...overrides, kind: 'method' };
}

export function classDeclaration(
    source: string,
    overrides: Partial<Omit<ClassDeclaration, 'kind'>> = {}
): ClassDeclaration {
    return {
        kind: 'class',
        name: /class (\w+)/.exec(signatureOf(source))?.[1] ?? 'C',
        parameters: [],
        docstring: docstringOf(source),
        noqa: [],
        ...span(source),
        ...overrides,
    };
}

export function moduleDeclaration(source: string): ModuleDeclaration {
    return { kind: 'module', docstring: docstringOf(source), noqa: [], ...span(source) };
}

// ============================================================
// Checks
// ============================================================

/**
 * Parses the declaration's docstring and runs one check over it.
 */
export function runCheck(check: Check, declaration: Declaration): readonly Diagnostic[] {
    if (declaration.docstring === null) {
        throw new Error('Fixture declaration has no docstring');
    }
    return check.validate(declaration, parseDocstring(declaration.docstring).docstring);
}
