/**
 * @fileoverview Configuration types for docstring-lint.
 * Defines the shape of .docstring-lint.json after validation.
 * Zero imports.
 *
 * @module types/config
 */

// ============================================================
// Output Format
// ============================================================

/**
 * - compact: one `path:line:col:endLine:endCol: CODE message` line per diagnostic
 * - detailed: source context with a caret underline
 */
export type OutputFormat = 'compact' | 'detailed';

// ============================================================
// Lint Configuration
// ============================================================

/**
 * Complete linter configuration.
 *
 * @example
 * const config: LintConfig = {
 *   select: ['GL', 'PR01'],
 *   ignore: ['GL08'],
 *   includePrivate: false,
 *   excludeMagic: true,
 *   format: 'compact',
 * };
 */
export interface LintConfig {
    /** Code prefixes to report; null reports everything */
    readonly select: readonly string[] | null;
    /** Code prefixes never to report */
    readonly ignore: readonly string[];
    /** Lint declarations whose name starts with an underscore */
    readonly includePrivate: boolean;
    /** Skip dunder methods such as `__init__` */
    readonly excludeMagic: boolean;
    readonly format: OutputFormat;
}
