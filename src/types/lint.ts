/**
 * @fileoverview Lint types for docstring-lint.
 * Defines diagnostic codes, diagnostics and the check contract.
 * Imports from types/base.ts, types/docstring.ts and types/declaration.ts.
 *
 * @module types/lint
 */

import type { Span } from './base.js';
import type { Declaration } from './declaration.js';
import type { DocString } from './docstring.js';

// ============================================================
// Diagnostic Codes
// ============================================================

/**
 * Codes reported by the parser rather than by a check.
 * ER00 is reserved for a check that failed while running.
 */
export type ParserCode = 'ER00' | 'ER01' | 'ER02' | 'ER03';

/**
 * Codes reported by checks. A check's id equals the code it reports.
 */
export type CheckId =
    | 'GL01' | 'GL02' | 'GL03' | 'GL05' | 'GL06' | 'GL07' | 'GL09' | 'GL10' | 'GL11'
    | 'SS01' | 'SS02' | 'SS03' | 'SS04' | 'SS05' | 'SS06'
    | 'ES01' | 'EX01'
    | 'PR01' | 'PR02' | 'PR03' | 'PR04' | 'PR05' | 'PR06' | 'PR07'
    | 'PR08' | 'PR09' | 'PR10' | 'PR11' | 'PR12' | 'PR13'
    | 'RT01' | 'RT02' | 'RT03' | 'RT04' | 'RT05'
    | 'YD01';

/**
 * Every code the linter can report. GL08 (missing docstring) is emitted by
 * the validator itself and stops further checking of the declaration.
 */
export type DiagnosticCode = ParserCode | CheckId | 'GL08';

// ============================================================
// Diagnostics
// ============================================================

/**
 * A single violation, anchored to an absolute source span.
 *
 * @example
 * const diagnostic: Diagnostic = {
 *   code: 'PR01',
 *   message: 'Parameter `y` should be documented.',
 *   start: { line: 3, column: 18 },
 *   end: { line: 3, column: 19 },
 *   terminates: false,
 * };
 */
export interface Diagnostic extends Span {
    readonly code: DiagnosticCode;
    readonly message: string;
    /** Replacement text to show next to the offending span */
    readonly suggestion?: string;
    /** Only true for GL08: no other diagnostic follows for the declaration */
    readonly terminates: boolean;
}

// ============================================================
// Checks
// ============================================================

/**
 * A stateless rule over a declaration and its parsed docstring.
 */
export interface Check {
    readonly id: CheckId;
    /** One-line description of what the check enforces */
    readonly description: string;
    validate(declaration: Declaration, docstring: DocString): readonly Diagnostic[];
}
