/**
 * @fileoverview Closed catalog of diagnostic codes and their messages.
 * Messages are templates with `{name}` placeholders filled when a
 * diagnostic is created.
 *
 * @module core/catalog
 */

import type { Position } from '../types/base.js';
import type { Diagnostic, DiagnosticCode } from '../types/lint.js';

// ============================================================
// Errors
// ============================================================

/**
 * Thrown when a code outside the catalog is looked up.
 */
export class UnknownDiagnosticCodeError extends Error {
    constructor(readonly code: string) {
        super(`Unknown diagnostic code ${code}`);
        this.name = 'UnknownDiagnosticCodeError';
    }
}

/**
 * Thrown when a message template names an argument that was not supplied.
 */
export class MissingMessageArgumentError extends Error {
    constructor(
        readonly code: DiagnosticCode,
        readonly argument: string
    ) {
        super(`Message for ${code} requires argument \`${argument}\``);
        this.name = 'MissingMessageArgumentError';
    }
}

// ============================================================
// Catalog
// ============================================================

const MESSAGES: Readonly<Record<DiagnosticCode, string>> = {
    // Parser and engine
    ER00: 'Check `{check}` failed: {reason}',
    ER01: 'Missing blank line before section `{section}`.',
    ER02: 'Section `{section}` underline is too short or too long.',
    ER03: 'Unexpected comma or period after function list in `See Also`.',
    // Global
    GL01: 'Docstring should start on a new line.',
    GL02: 'Docstring should end one line before the closing quotes.',
    GL03: 'Docstring should not contain double line breaks.',
    GL05: 'Docstring line should not start with tabs.',
    GL06: 'Docstring contains unexpected section `{section}`.',
    GL07: 'Sections are in the wrong order.',
    GL08: 'The {kind} does not have a docstring.',
    GL09: 'Deprecation warning should precede extended summary.',
    GL10: 'reST directives must be followed by two colons.',
    GL11: 'Summary should only contain a single deprecation warning.',
    // Summary
    SS01: 'No summary found.',
    SS02: 'Summary does not start with a capital letter.',
    SS03: 'Summary does not end with a period.',
    SS04: 'Summary contains heading whitespaces.',
    SS05: 'Summary must start with infinitive verb, not third person.',
    SS06: 'Summary should fit in a single line.',
    ES01: 'No extended summary found.',
    EX01: 'No examples section found.',
    // Parameters
    PR01: 'Parameter `{parameter}` should be documented.',
    PR02: 'Parameter `{parameter}` does not exist in the declaration.',
    PR03: 'Parameter `{parameter}` is in the wrong order.',
    PR04: 'Parameter `{parameter}` should have a type.',
    PR05: 'Parameter `{parameter}` type should not finish with `.`.',
    PR06: 'Parameter `{parameter}` uses discouraged type `{type}`.',
    PR07: '{subject} has no description.',
    PR08: '{subject} description should start with an uppercase letter.',
    PR09: '{subject} description should end with a period.',
    PR10: 'Parameter `{parameter}` requires a space before and after `:`.',
    PR11: '{subject} description has empty prefix lines.',
    PR12: '{subject} description has empty suffix lines.',
    PR13: 'Parameter `{parameter}` specifies `optional` multiple times.',
    // Returns and yields
    RT01: 'No Returns section found.',
    RT02: 'Single return `{name}` should only use the type.',
    RT03: '{subject} has no description.',
    RT04: '{subject} description should start with an uppercase letter.',
    RT05: '{subject} description should end with a period.',
    YD01: 'No Yields section found.',
};

export function isDiagnosticCode(code: string): code is DiagnosticCode {
    return Object.hasOwn(MESSAGES, code);
}

/**
 * Returns the message template of a code.
 *
 * @throws UnknownDiagnosticCodeError for codes outside the catalog
 */
export function describeCode(code: string): string {
    if (!isDiagnosticCode(code)) {
        throw new UnknownDiagnosticCodeError(code);
    }
    return MESSAGES[code];
}

export function listCodes(): DiagnosticCode[] {
    return Object.keys(MESSAGES).filter(isDiagnosticCode);
}

// ============================================================
// Diagnostic Creation
// ============================================================

export interface DiagnosticOptions {
    readonly start: Position;
    /** Defaults to `start` (zero-width) */
    readonly end?: Position;
    readonly args?: Readonly<Record<string, string>>;
    readonly suggestion?: string;
}

/**
 * Creates a diagnostic with its rendered catalog message.
 *
 * @example
 * createDiagnostic('PR01', {
 *     start: { line: 3, column: 18 },
 *     end: { line: 3, column: 19 },
 *     args: { parameter: 'y' },
 * });
 * // message: 'Parameter `y` should be documented.'
 *
 * @throws MissingMessageArgumentError when a placeholder has no argument
 */
export function createDiagnostic(code: DiagnosticCode, options: DiagnosticOptions): Diagnostic {
    const message = renderMessage(code, options.args ?? {});
    return {
        code,
        message,
        start: options.start,
        end: options.end ?? options.start,
        ...(options.suggestion === undefined ? {} : { suggestion: options.suggestion }),
        terminates: code === 'GL08',
    };
}

function renderMessage(code: DiagnosticCode, args: Readonly<Record<string, string>>): string {
    return describeCode(code).replace(/\{(\w+)\}/g, (_placeholder, name: string) => {
        const value = args[name];
        if (value === undefined) {
            throw new MissingMessageArgumentError(code, name);
        }
        return value;
    });
}
