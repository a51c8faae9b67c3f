/**
 * @fileoverview Diagnostic suppression: inline `noqa` codes plus the
 * configured select/ignore code prefixes. A pure membership test, so the
 * order in which filters apply does not matter.
 *
 * @module core/linter/suppression
 */

import type { Check } from '../../types/lint.js';

export interface Suppression {
    /** Prefixes to keep; null keeps every code */
    readonly select: readonly string[] | null;
    /** Prefixes to drop */
    readonly ignore: readonly string[];
}

/**
 * @example
 * matchesPrefix('PR01', ['GL', 'PR']); // true
 */
export function matchesPrefix(code: string, prefixes: readonly string[]): boolean {
    return prefixes.some((prefix) => code.startsWith(prefix));
}

/**
 * True when a diagnostic with `code` should be reported.
 */
export function isReported(
    code: string,
    noqa: readonly string[],
    suppression: Suppression
): boolean {
    if (noqa.includes(code)) {
        return false;
    }
    if (suppression.select !== null && !matchesPrefix(code, suppression.select)) {
        return false;
    }
    return !matchesPrefix(code, suppression.ignore);
}

/**
 * The checks whose code survives the configured selection. The input list
 * is left untouched.
 */
export function selectChecks(
    checks: readonly Check[],
    suppression: Suppression
): readonly Check[] {
    return Object.freeze(checks.filter((check) => isReported(check.id, [], suppression)));
}
