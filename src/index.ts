/**
 * @fileoverview Public entry point for docstring-lint.
 *
 * @module index
 */

export type * from './types/index.js';

export {
    ok,
    err,
    mapResult,
    mapError,
    flatMapResult,
    position,
    movePosition,
    normalizePosition,
    comparePositions,
    span,
} from './utils/index.js';
export type { PositionMove } from './utils/index.js';

export { parseDocstring, tokenizeTypes } from './core/docstring/index.js';
export type { ParseResult, TypeList, TypeToken } from './core/docstring/index.js';

export {
    createDiagnostic,
    describeCode,
    isDiagnosticCode,
    listCodes,
    MissingMessageArgumentError,
    UnknownDiagnosticCodeError,
} from './core/catalog.js';
export type { DiagnosticOptions } from './core/catalog.js';

export { declarationName, isCallable, isMagic, isPrivate } from './core/declaration.js';

export { CHECKS } from './core/linter/registry.js';
export { createLintContext, validateDeclaration } from './core/linter/validator.js';
export type { LintContext, LintContextOptions, Logger } from './core/linter/validator.js';
export { isReported, selectChecks } from './core/linter/suppression.js';
export type { Suppression } from './core/linter/suppression.js';
export { lintManifest, reportFile, summarize, writeReport } from './core/linter/linter.js';
export type { FileReport, LintSummary } from './core/linter/linter.js';

export { decodeManifest, parseManifest, readManifest } from './core/manifest.js';
export type { ManifestError } from './core/manifest.js';

export {
    DiagnosticReport,
    formatCompact,
    formatDetailed,
    formatDiagnostic,
} from './core/renderer/diagnostics.js';
export type { SourceSnippet, TextSink } from './core/renderer/diagnostics.js';

export { CONFIG_FILE, getDefault, loadConfig, mergeConfigs, validateConfig } from './state/config.js';
export type { ConfigError, PartialLintConfig } from './state/config.js';
