/**
 * @fileoverview File-level lint orchestration.
 * Runs the validator over every declaration of a manifest and collects the
 * diagnostics per file.
 * Layer 2 - imports from Layer 0 (types/) and Layer 1 (validator, renderer).
 *
 * @module core/linter/linter
 */

import type { LintConfig } from '../../types/config.js';
import type { FileManifest } from '../../types/declaration.js';
import type { Diagnostic } from '../../types/lint.js';
import type { SourceSnippet, TextSink } from '../renderer/diagnostics.js';
import { DiagnosticReport } from '../renderer/diagnostics.js';
import type { LintContext } from './validator.js';
import { validateDeclaration } from './validator.js';

// ============================================================
// Report Types
// ============================================================

/**
 * Diagnostics of one file, in declaration order.
 */
export interface FileReport {
    readonly path: string;
    readonly diagnostics: readonly Diagnostic[];
    /** Whole-file source, when the manifest carried it */
    readonly snippet: SourceSnippet | null;
}

/**
 * Code counts across a set of reports.
 */
export interface LintSummary {
    readonly files: number;
    readonly diagnostics: number;
    readonly byCode: ReadonlyMap<string, number>;
}

// ============================================================
// Linting
// ============================================================

/**
 * Lints every declaration of a file.
 *
 * @example
 * const result = await readManifest('build/shapes.json');
 * if (result.ok) {
 *     const report = lintManifest(result.value, createLintContext(getDefault()));
 *     console.log(`${report.diagnostics.length} problems in ${report.path}`);
 * }
 */
export function lintManifest(manifest: FileManifest, context: LintContext): FileReport {
    return {
        path: manifest.path,
        diagnostics: manifest.declarations.flatMap((declaration) =>
            validateDeclaration(declaration, context)
        ),
        snippet:
            manifest.source === null
                ? null
                : { start: { line: 1, column: 1 }, lines: manifest.source.split('\n') },
    };
}

/**
 * Adds every diagnostic of a file report to `report`.
 */
export function reportFile(report: DiagnosticReport, file: FileReport): void {
    for (const diagnostic of file.diagnostics) {
        report.add(file.path, diagnostic, file.snippet ?? undefined);
    }
}

/**
 * Writes the reports to `sink` in the configured output format.
 * Returns the number of diagnostics written.
 *
 * @example
 * const count = writeReport(reports, process.stdout, context.config);
 * process.exitCode = count > 0 ? 1 : 0;
 */
export function writeReport(
    files: readonly FileReport[],
    sink: TextSink,
    config: LintConfig
): number {
    const report = new DiagnosticReport();
    for (const file of files) {
        reportFile(report, file);
    }
    report.write(sink, config.format);
    return report.count;
}

export function summarize(reports: readonly FileReport[]): LintSummary {
    const byCode = new Map<string, number>();
    let diagnostics = 0;

    for (const report of reports) {
        for (const diagnostic of report.diagnostics) {
            byCode.set(diagnostic.code, (byCode.get(diagnostic.code) ?? 0) + 1);
            diagnostics++;
        }
    }

    return { files: reports.length, diagnostics, byCode };
}
