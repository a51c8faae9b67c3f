/**
 * @fileoverview Per-declaration validation.
 *
 * A declaration goes through four stages, stopping at the first
 * terminating diagnostic:
 * 1. filter out private and (optionally) magic declarations;
 * 2. report GL08 and stop when there is no docstring;
 * 3. parse, reporting layout defects;
 * 4. run the selected checks in registry order.
 *
 * @module core/linter/validator
 */

import type { LintConfig } from '../../types/config.js';
import type { Declaration } from '../../types/declaration.js';
import type { DocString } from '../../types/docstring.js';
import type { Check, Diagnostic } from '../../types/lint.js';
import { createDiagnostic } from '../catalog.js';
import { isMagic, isPrivate } from '../declaration.js';
import { parseDocstring } from '../docstring/parse.js';
import { CHECKS } from './registry.js';
import { isReported, selectChecks } from './suppression.js';

// ============================================================
// Types
// ============================================================

/**
 * Where contained check failures are written.
 */
export type Logger = Pick<Console, 'warn'>;

/**
 * Everything validation needs, derived once per run.
 */
export interface LintContext {
    readonly config: LintConfig;
    /** Checks left after applying `config.select` and `config.ignore` */
    readonly checks: readonly Check[];
    readonly logger: Logger;
}

export interface LintContextOptions {
    /** Replaces the built-in registry */
    readonly checks?: readonly Check[];
    /** Defaults to `console` */
    readonly logger?: Logger;
}

const LOG_PREFIX = '[docstring-lint]';

// ============================================================
// Context
// ============================================================

/**
 * @example
 * const context = createLintContext({ ...getDefault(), ignore: ['EX01', 'ES01'] });
 * const diagnostics = validateDeclaration(declaration, context);
 */
export function createLintContext(
    config: LintConfig,
    options: LintContextOptions = {}
): LintContext {
    return {
        config,
        checks: selectChecks(options.checks ?? CHECKS, config),
        logger: options.logger ?? console,
    };
}

// ============================================================
// Validation
// ============================================================

/**
 * Validates one declaration. Diagnostics keep check order.
 */
export function validateDeclaration(
    declaration: Declaration,
    context: LintContext
): Diagnostic[] {
    const { config } = context;
    const reported = (diagnostic: Diagnostic): boolean =>
        isReported(diagnostic.code, declaration.noqa, config);

    if (!config.includePrivate && isPrivate(declaration)) {
        return [];
    }
    if (config.excludeMagic && isMagic(declaration)) {
        return [];
    }

    if (declaration.docstring === null) {
        return [missingDocstring(declaration)].filter(reported);
    }

    const parsed = parseDocstring(declaration.docstring);
    const diagnostics = parsed.diagnostics.filter(reported);

    for (const check of context.checks) {
        if (declaration.noqa.includes(check.id)) {
            continue;
        }
        const found = runCheck(check, declaration, parsed.docstring, context.logger);
        // ER00 belongs to a selected check, so prefixes do not hide it
        diagnostics.push(
            ...found.filter((diagnostic) => diagnostic.code === 'ER00' || reported(diagnostic))
        );
        if (found.some((diagnostic) => diagnostic.terminates)) {
            break;
        }
    }

    return diagnostics;
}

function missingDocstring(declaration: Declaration): Diagnostic {
    return createDiagnostic('GL08', {
        start: declaration.start,
        end: declaration.end,
        args: { kind: declaration.kind },
        suggestion: 'Add a docstring.',
    });
}

/**
 * Runs one check; a throwing check becomes a single ER00 diagnostic.
 */
function runCheck(
    check: Check,
    declaration: Declaration,
    docstring: DocString,
    logger: Logger
): readonly Diagnostic[] {
    try {
        return check.validate(declaration, docstring);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`${LOG_PREFIX} Check ${check.id} failed at ${docstring.start.line}:${docstring.start.column}: ${reason}`);
        return [
            createDiagnostic('ER00', {
                start: docstring.start,
                end: docstring.contentStart,
                args: { check: check.id, reason },
            }),
        ];
    }
}
