/**
 * @fileoverview Diagnostic rendering.
 * Pure formatting functions plus a report that collects diagnostics per
 * file and writes them in one of the output formats.
 *
 * @module core/renderer/diagnostics
 */

import type { Position } from '../../types/base.js';
import type { OutputFormat } from '../../types/config.js';
import type { Diagnostic } from '../../types/lint.js';
import { normalizePosition } from '../../utils/position.js';

// ============================================================
// Types
// ============================================================

/**
 * Source lines for context output; `lines[0]` sits on `start.line`.
 */
export interface SourceSnippet {
    readonly start: Position;
    readonly lines: readonly string[];
}

/**
 * Anything text can be written to, e.g. `process.stdout`.
 */
export interface TextSink {
    write(chunk: string): unknown;
}

interface ReportEntry {
    readonly diagnostic: Diagnostic;
    readonly snippet: SourceSnippet | undefined;
}

// ============================================================
// Formatting
// ============================================================

/**
 * @example
 * formatCompact('shapes.py', diagnostic);
 * // 'shapes.py:3:18:3:19: PR01 Parameter `y` should be documented.\n'
 */
export function formatCompact(path: string, diagnostic: Diagnostic): string {
    const { start, end } = diagnostic;
    return `${path}:${start.line}:${start.column}:${end.line}:${end.column}: ${diagnostic.code} ${diagnostic.message}\n`;
}

/**
 * Renders a diagnostic with source context:
 *
 *     error[PR01]: Parameter `y` should be documented.
 *      --> shapes.py:3:10
 *     2 | def area(x,
 *     3 |          y):
 *       |          ^
 *
 * Falls back to the compact form when the snippet does not cover the
 * diagnostic.
 */
export function formatDetailed(
    path: string,
    diagnostic: Diagnostic,
    snippet?: SourceSnippet
): string {
    const { start, end } = diagnostic;
    const row = snippet === undefined ? -1 : normalizePosition(start, snippet.start).line;
    if (snippet === undefined || row < 0 || row >= snippet.lines.length) {
        return formatCompact(path, diagnostic);
    }

    const gutter = String(start.line).length;
    const pad = ' '.repeat(gutter);
    const out: string[] = [
        `error[${diagnostic.code}]: ${diagnostic.message}`,
        `${pad}--> ${path}:${start.line}:${start.column}`,
    ];

    for (let i = Math.max(0, row - 1); i <= row; i++) {
        const number = String(snippet.start.line + i).padEnd(gutter);
        out.push(`${number} | ${snippet.lines[i] ?? ''}`);
    }

    const width = Math.max(1, end.column - start.column);
    const margin = `${pad} | ${' '.repeat(Math.max(0, start.column - 1))}`;
    out.push(margin + '^'.repeat(width));

    if (diagnostic.suggestion !== undefined) {
        const under = margin + ' '.repeat(width - 1);
        out.push(`${under}|`, under + diagnostic.suggestion);
    }

    return out.join('\n') + '\n';
}

export function formatDiagnostic(
    format: OutputFormat,
    path: string,
    diagnostic: Diagnostic,
    snippet?: SourceSnippet
): string {
    switch (format) {
        case 'compact':
            return formatCompact(path, diagnostic);
        case 'detailed':
            return formatDetailed(path, diagnostic, snippet);
    }
}

// ============================================================
// Report
// ============================================================

/**
 * Collects diagnostics per file, keeping insertion order.
 *
 * @example
 * const report = new DiagnosticReport();
 * report.add('shapes.py', diagnostic);
 * report.write(process.stdout, 'compact');
 * process.exitCode = report.hasDiagnostics ? 1 : 0;
 */
export class DiagnosticReport {
    private readonly files = new Map<string, ReportEntry[]>();

    add(path: string, diagnostic: Diagnostic, snippet?: SourceSnippet): void {
        const entries = this.files.get(path) ?? [];
        entries.push({ diagnostic, snippet });
        this.files.set(path, entries);
    }

    get count(): number {
        let total = 0;
        for (const entries of this.files.values()) {
            total += entries.length;
        }
        return total;
    }

    get hasDiagnostics(): boolean {
        return this.count > 0;
    }

    /**
     * Paths with at least one diagnostic, in insertion order.
     */
    get paths(): string[] {
        return [...this.files.keys()];
    }

    format(format: OutputFormat): string {
        let text = '';
        for (const [path, entries] of this.files) {
            for (const { diagnostic, snippet } of entries) {
                text += formatDiagnostic(format, path, diagnostic, snippet);
            }
        }
        return text;
    }

    write(sink: TextSink, format: OutputFormat): void {
        sink.write(this.format(format));
    }
}
