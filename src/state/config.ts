/**
 * @fileoverview Configuration management for docstring-lint.
 * Handles loading, validation, and merging of .docstring-lint.json files.
 *
 * @module state/config
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type { LintConfig } from '../types/config.js';
import { err, ok } from '../utils/result.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for configuration operations.
 */
export type ConfigError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

/**
 * A configuration where every field may be left out.
 */
export type PartialLintConfig = { -readonly [K in keyof LintConfig]?: LintConfig[K] };

// ============================================================
// Constants
// ============================================================

export const CONFIG_FILE = '.docstring-lint.json';

const DEFAULT_CONFIG: LintConfig = {
    select: null,
    ignore: [],
    includePrivate: false,
    excludeMagic: false,
    format: 'compact',
};

/**
 * Shape of the config file. Keys are kebab-case on disk.
 */
const ConfigFileSchema = z
    .object({
        select: z.array(z.string().min(1)).nullable().optional(),
        ignore: z.array(z.string().min(1)).optional(),
        'include-private': z.boolean().optional(),
        'exclude-magic': z.boolean().optional(),
        format: z.enum(['compact', 'detailed']).optional(),
    })
    .strict();

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default configuration: every code selected, nothing ignored,
 * private declarations skipped, magic methods linted.
 *
 * @example
 * const config = getDefault();
 * console.log(config.format); // 'compact'
 */
export function getDefault(): LintConfig {
    return { ...DEFAULT_CONFIG };
}

// ============================================================
// Configuration Validation
// ============================================================

/**
 * Validates the parsed contents of a config file.
 *
 * @param obj - The object to validate
 * @returns The fields present in the file, in camelCase
 */
export function validateConfig(obj: unknown): Result<PartialLintConfig, ConfigError> {
    const parsed = ConfigFileSchema.safeParse(obj);
    if (!parsed.success) {
        const message = parsed.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        return err({ type: 'validation', message: `Invalid ${CONFIG_FILE}: ${message}` });
    }

    const file = parsed.data;
    const config: PartialLintConfig = {};
    if (file.select !== undefined) config.select = file.select;
    if (file.ignore !== undefined) config.ignore = file.ignore;
    if (file['include-private'] !== undefined) config.includePrivate = file['include-private'];
    if (file['exclude-magic'] !== undefined) config.excludeMagic = file['exclude-magic'];
    if (file.format !== undefined) config.format = file.format;
    return ok(config);
}

// ============================================================
// Configuration Merging
// ============================================================

/**
 * Merges a partial configuration over a complete one.
 * Fields left out of `override` keep their base value; an explicit
 * `select: null` resets selection to every code.
 *
 * @example
 * const merged = mergeConfigs(getDefault(), { ignore: ['EX01'] });
 */
export function mergeConfigs(base: LintConfig, override: PartialLintConfig): LintConfig {
    return {
        select: override.select === undefined ? base.select : override.select,
        ignore: override.ignore ?? base.ignore,
        includePrivate: override.includePrivate ?? base.includePrivate,
        excludeMagic: override.excludeMagic ?? base.excludeMagic,
        format: override.format ?? base.format,
    };
}

// ============================================================
// Configuration Loading
// ============================================================

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Loads configuration from a directory.
 * Reads .docstring-lint.json if it exists, otherwise returns defaults.
 *
 * @param directory - The directory holding the config file
 * @returns AsyncResult with the loaded configuration or error
 *
 * @example
 * const result = await loadConfig(process.cwd());
 * if (!result.ok) {
 *   console.error(`[docstring-lint] ${result.error.message}`);
 * }
 */
export async function loadConfig(directory: string): AsyncResult<LintConfig, ConfigError> {
    const file = join(directory, CONFIG_FILE);

    let json: string;
    try {
        json = await readFile(file, 'utf-8');
    } catch (e) {
        if (isMissingFile(e)) {
            return ok(getDefault());
        }
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'io', message: `Failed to load config: ${message}` });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'parse', message: `Invalid JSON in ${CONFIG_FILE}: ${message}` });
    }

    const validationResult = validateConfig(parsed);
    if (!validationResult.ok) {
        return validationResult;
    }

    return ok(mergeConfigs(getDefault(), validationResult.value));
}
