/**
 * @fileoverview Property tests for validation: results are deterministic
 * and configuration merging behaves as an override.
 *
 * @module test/property/validation.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { LintConfig, OutputFormat } from '../../src/types/config.js';
import { listCodes } from '../../src/core/catalog.js';
import { createLintContext, validateDeclaration } from '../../src/core/linter/validator.js';
import { getDefault, mergeConfigs } from '../../src/state/config.js';
import { functionDeclaration, functionSource } from '../helpers/fixtures.js';

// ============================================================
// Arbitrary Generators
// ============================================================

const arbPrefix = fc.constantFrom(...listCodes(), 'GL', 'SS', 'PR', 'RT', 'ER', 'E');

const arbFormat: fc.Arbitrary<OutputFormat> = fc.constantFrom('compact', 'detailed');

const arbConfig: fc.Arbitrary<LintConfig> = fc.record({
    select: fc.option(fc.array(arbPrefix, { maxLength: 4 }), { nil: null }),
    ignore: fc.array(arbPrefix, { maxLength: 4 }),
    includePrivate: fc.boolean(),
    excludeMagic: fc.boolean(),
    format: arbFormat,
});

const arbBody = fc.array(
    fc.constantFrom(
        '    summary.',
        '    Returns the total',
        '',
        '    Parameters',
        '    ------',
        '    x : integer.',
        '    y',
        '        lowercase',
        '    Notes',
        '    -----',
        '    .. deprecated:: 1.0',
        '    .. versionadded 2.0'
    ),
    { maxLength: 16 }
);

// ============================================================
// Properties
// ============================================================

describe('Property: validation', () => {
    it('returns identical diagnostics when run twice', () => {
        fc.assert(
            fc.property(arbBody, arbConfig, (body, config) => {
                const declaration = functionDeclaration(functionSource('def f(x, y):', body), { returns: 1 });
                const context = createLintContext(config);
                expect(validateDeclaration(declaration, context)).toEqual(
                    validateDeclaration(declaration, context)
                );
            }),
            { numRuns: 100 }
        );
    });

    it('only reports selected and unignored codes', () => {
        fc.assert(
            fc.property(arbBody, arbConfig, (body, config) => {
                const declaration = functionDeclaration(functionSource('def f(x, y):', body));
                for (const diagnostic of validateDeclaration(declaration, createLintContext(config))) {
                    const { select, ignore } = config;
                    expect(select === null || select.some((p) => diagnostic.code.startsWith(p))).toBe(true);
                    expect(ignore.some((p) => diagnostic.code.startsWith(p))).toBe(false);
                }
            }),
            { numRuns: 100 }
        );
    });
});

describe('Property: configuration merge', () => {
    it('keeps the base for an empty override', () => {
        fc.assert(
            fc.property(arbConfig, (config) => {
                expect(mergeConfigs(config, {})).toEqual(config);
            })
        );
    });

    it('takes every field of a complete override', () => {
        fc.assert(
            fc.property(arbConfig, arbConfig, (base, override) => {
                expect(mergeConfigs(base, override)).toEqual(override);
            })
        );
    });

    it('defaults are a neutral base', () => {
        fc.assert(
            fc.property(arbConfig, (config) => {
                expect(mergeConfigs(getDefault(), config)).toEqual(config);
            })
        );
    });
});
