/**
 * @fileoverview Description quality predicates shared by the parameter and
 * return check families. Each helper takes the code to report and a label
 * naming the subject (e.g. "Parameter `x`", "Return `int`").
 * Layer 1 - pure functions over the document model.
 *
 * @module core/linter/description
 */

import type { Span } from '../../types/base.js';
import type { DocString, DocstringLine, ParameterEntry, Paragraph, Token } from '../../types/docstring.js';
import type { Diagnostic, DiagnosticCode } from '../../types/lint.js';
import { createDiagnostic } from '../catalog.js';
import {
    countLeadingBlankLines,
    countTrailingBlankLines,
    isBlank,
    leadingWhitespace,
} from '../docstring/lines.js';

// ============================================================
// Types
// ============================================================

/**
 * What a description belongs to, and where to report its defects.
 */
export interface DescriptionSubject {
    /** Message label, e.g. "Parameter `x`" */
    readonly label: string;
    readonly anchor: Span;
}

// ============================================================
// Helpers
// ============================================================

/**
 * Lines opening a version directive end the description proper.
 */
const VERSION_DIRECTIVE = /^\s*\.\. (versionadded|versionchanged|deprecated)/i;

/**
 * Non-blank description lines before the first version directive.
 */
export function describedLines(paragraph: Paragraph): DocstringLine[] {
    const end = paragraph.lines.findIndex((line) => VERSION_DIRECTIVE.test(line.text));
    const lines = end === -1 ? paragraph.lines : paragraph.lines.slice(0, end);
    return lines.filter((line) => !isBlank(line));
}

/**
 * True when the first character is a lowercase letter.
 */
export function startsLowercase(text: string): boolean {
    const first = text.trimStart().charAt(0);
    return first !== first.toUpperCase() && first === first.toLowerCase();
}

/**
 * The token naming an entry: its name, else its first type, else the header.
 */
export function entryToken(entry: ParameterEntry): Token {
    return entry.name ?? entry.types?.[0] ?? entry.header;
}

export function subjectOf(noun: string, entry: ParameterEntry): DescriptionSubject {
    const token = entryToken(entry);
    return { label: `${noun} \`${token.value}\``, anchor: { start: token.start, end: token.end } };
}

/**
 * Entries of a Parameters-like section, or an empty list when absent.
 */
export function sectionEntries(docstring: DocString, name: string): readonly ParameterEntry[] {
    const section = docstring.sections.get(name);
    return section !== undefined && section.contents.kind === 'parameters'
        ? section.contents.entries
        : [];
}

function report(
    code: DiagnosticCode,
    subject: DescriptionSubject,
    suggestion: string
): Diagnostic[] {
    return [
        createDiagnostic(code, {
            start: subject.anchor.start,
            end: subject.anchor.end,
            args: { subject: subject.label },
            suggestion,
        }),
    ];
}

// ============================================================
// Predicates
// ============================================================

export function checkHasDescription(
    code: DiagnosticCode,
    description: Paragraph,
    subject: DescriptionSubject
): Diagnostic[] {
    if (describedLines(description).length > 0) {
        return [];
    }
    return report(code, subject, 'Add a description.');
}

export function checkStartsUppercase(
    code: DiagnosticCode,
    description: Paragraph,
    subject: DescriptionSubject
): Diagnostic[] {
    const first = describedLines(description)[0];
    if (first === undefined || !startsLowercase(first.text)) {
        return [];
    }
    const letter = first.text.trimStart().charAt(0);
    return report(code, subject, `Replace \`${letter}\` with \`${letter.toUpperCase()}\`.`);
}

/**
 * Only the last line counts. List items (`*`, `- `) and lines indented
 * deeper than the first line (code blocks) are exempt.
 */
export function checkEndsWithPeriod(
    code: DiagnosticCode,
    description: Paragraph,
    subject: DescriptionSubject
): Diagnostic[] {
    const lines = describedLines(description);
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (first === undefined || last === undefined) {
        return [];
    }

    const text = last.text.trim();
    if (text.startsWith('*') || text.startsWith('- ')) {
        return [];
    }
    if (leadingWhitespace(last.text) > leadingWhitespace(first.text)) {
        return [];
    }
    if (text.endsWith('.')) {
        return [];
    }
    return report(code, subject, 'Add a period to the end of the description.');
}

export function checkNoLeadingBlankLines(
    code: DiagnosticCode,
    description: Paragraph,
    subject: DescriptionSubject
): Diagnostic[] {
    const lines = description.lines;
    const leading = countLeadingBlankLines(lines);
    if (leading === 0 || leading === lines.length) {
        return [];
    }
    return report(code, subject, 'Remove empty lines.');
}

export function checkNoTrailingBlankLines(
    code: DiagnosticCode,
    description: Paragraph,
    subject: DescriptionSubject
): Diagnostic[] {
    const lines = description.lines;
    const trailing = countTrailingBlankLines(lines);
    if (trailing === 0 || trailing === lines.length) {
        return [];
    }
    return report(code, subject, 'Remove empty lines.');
}
