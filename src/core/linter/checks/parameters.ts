/**
 * @fileoverview Parameter checks (PR01-PR13) for classes, functions and
 * methods. Parameters may be documented under either Parameters or
 * Other Parameters.
 *
 * @module core/linter/checks/parameters
 */

import type { DeclaredParameter, Declaration } from '../../../types/declaration.js';
import type { DocString, ParameterEntry } from '../../../types/docstring.js';
import type { Check, Diagnostic } from '../../../types/lint.js';
import { movePosition } from '../../../utils/position.js';
import { createDiagnostic } from '../../catalog.js';
import { hasParameters } from '../../declaration.js';
import {
    checkEndsWithPeriod,
    checkHasDescription,
    checkNoLeadingBlankLines,
    checkNoTrailingBlankLines,
    checkStartsUppercase,
    entryToken,
    sectionEntries,
    subjectOf,
} from '../description.js';

// ============================================================
// Constants
// ============================================================

const PARAMETER_SECTIONS = ['Parameters', 'Other Parameters'] as const;

const DISCOURAGED_TYPES: ReadonlyMap<string, string> = new Map([
    ['integer', 'int'],
    ['boolean', 'bool'],
    ['string', 'str'],
]);

const EMPTY_CHOICE = /^\{\s*\}$/;

const BAD_COLON_SPACING = /(\S:|:\S|:\s*$|^\s*:)/g;

// ============================================================
// Helpers
// ============================================================

/**
 * `*args` and `args` name the same parameter.
 */
function bareName(name: string): string {
    return name.replace(/^\*{1,2}/, '');
}

function declaredParameters(declaration: Declaration): readonly DeclaredParameter[] | null {
    return hasParameters(declaration) ? declaration.parameters : null;
}

/**
 * Documented entries of every parameter section, grouped per section.
 */
function documentedSections(docstring: DocString): Array<readonly ParameterEntry[]> {
    return PARAMETER_SECTIONS.map((name) => sectionEntries(docstring, name));
}

function documentedEntries(docstring: DocString): ParameterEntry[] {
    return documentedSections(docstring).flat();
}

function entryName(entry: ParameterEntry): string {
    return entryToken(entry).value;
}

/**
 * Builds a parameter check: `validate` only runs for declarations with a
 * signature.
 */
function parameterCheck(
    id: Check['id'],
    description: string,
    validate: (parameters: readonly DeclaredParameter[], docstring: DocString) => Diagnostic[]
): Check {
    return {
        id,
        description,
        validate(declaration, docstring) {
            const parameters = declaredParameters(declaration);
            return parameters === null ? [] : validate(parameters, docstring);
        },
    };
}

/**
 * Builds a description check over every documented entry, with the entry's
 * index in its section and the section size.
 */
function entryCheck(
    id: Check['id'],
    description: string,
    validate: (entry: ParameterEntry, index: number, count: number) => Diagnostic[]
): Check {
    return parameterCheck(id, description, (_parameters, docstring) =>
        documentedSections(docstring).flatMap((entries) =>
            entries.flatMap((entry, index) => validate(entry, index, entries.length))
        )
    );
}

// ============================================================
// Declaration Agreement
// ============================================================

export const PR01 = parameterCheck(
    'PR01',
    'Every declared parameter is documented.',
    (parameters, docstring) => {
        const documented = new Set(documentedEntries(docstring).map((entry) => bareName(entryName(entry))));
        return parameters
            .filter((parameter) => !documented.has(parameter.name))
            .map((parameter) =>
                createDiagnostic('PR01', {
                    start: parameter.start,
                    end: parameter.end,
                    args: { parameter: parameter.name },
                    suggestion: `Add documentation for \`${parameter.name}\`.`,
                })
            );
    }
);

export const PR02 = parameterCheck(
    'PR02',
    'Every documented parameter is declared.',
    (parameters, docstring) => {
        const declared = new Set(parameters.map((parameter) => parameter.name));
        return documentedEntries(docstring)
            .filter((entry) => entry.name !== null && !declared.has(bareName(entry.name.value)))
            .map((entry) => {
                const token = entryToken(entry);
                return createDiagnostic('PR02', {
                    start: token.start,
                    end: token.end,
                    args: { parameter: token.value },
                    suggestion: `Remove or declare \`${token.value}\`.`,
                });
            });
    }
);

/**
 * Only compares when the Parameters section and the signature have the
 * same length.
 */
export const PR03 = parameterCheck(
    'PR03',
    'Documented parameters follow declaration order.',
    (parameters, docstring) => {
        const entries = sectionEntries(docstring, 'Parameters');
        if (entries.length === 0 || entries.length !== parameters.length) {
            return [];
        }
        return entries.flatMap((entry, index) => {
            const declared = parameters[index];
            const token = entryToken(entry);
            if (declared === undefined || bareName(token.value) === declared.name) {
                return [];
            }
            return [
                createDiagnostic('PR03', {
                    start: token.start,
                    end: token.end,
                    args: { parameter: token.value },
                    suggestion: `The parameter should be \`${declared.name}\`.`,
                }),
            ];
        });
    }
);

// ============================================================
// Types
// ============================================================

export const PR04 = parameterCheck(
    'PR04',
    'Every documented parameter has a type.',
    (parameters, docstring) =>
        documentedEntries(docstring)
            .filter((entry) => entry.types === null)
            .map((entry) => {
                const token = entryToken(entry);
                const declared = parameters.find((parameter) => parameter.name === bareName(token.value));
                const annotation = declared?.annotation ?? null;
                return createDiagnostic('PR04', {
                    start: token.start,
                    end: token.end,
                    args: { parameter: token.value },
                    suggestion:
                        annotation === null
                            ? 'Add a type declaration.'
                            : `Add the type declaration \`${annotation}\`.`,
                });
            })
);

export const PR05 = parameterCheck(
    'PR05',
    'A type list does not end with a period.',
    (_parameters, docstring) =>
        documentedEntries(docstring).flatMap((entry) => {
            const types = entry.types ?? [];
            const last = types[types.length - 1];
            if (last === undefined || !last.value.endsWith('.')) {
                return [];
            }
            return [
                createDiagnostic('PR05', {
                    start: last.end,
                    args: { parameter: entryName(entry) },
                    suggestion: 'Remove `.`.',
                }),
            ];
        })
);

export const PR06 = parameterCheck(
    'PR06',
    'Types use the short builtin spelling and choice sets are not empty.',
    (_parameters, docstring) =>
        documentedEntries(docstring).flatMap((entry) =>
            (entry.types ?? []).flatMap((type) => {
                const preferred = DISCOURAGED_TYPES.get(type.value);
                let suggestion: string;
                if (preferred !== undefined) {
                    suggestion = `Use \`${preferred}\` instead of \`${type.value}\`.`;
                } else if (EMPTY_CHOICE.test(type.value)) {
                    suggestion = 'Insert choices.';
                } else {
                    return [];
                }
                return [
                    createDiagnostic('PR06', {
                        start: type.start,
                        end: type.end,
                        args: { parameter: entryName(entry), type: type.value },
                        suggestion,
                    }),
                ];
            })
        )
);

// ============================================================
// Descriptions
// ============================================================

export const PR07 = entryCheck('PR07', 'Every parameter has a description.', (entry) =>
    checkHasDescription('PR07', entry.description, subjectOf('Parameter', entry))
);

export const PR08 = entryCheck(
    'PR08',
    'Parameter descriptions start with a capital letter.',
    (entry) => checkStartsUppercase('PR08', entry.description, subjectOf('Parameter', entry))
);

export const PR09 = entryCheck(
    'PR09',
    'Parameter descriptions end with a period.',
    (entry) => checkEndsWithPeriod('PR09', entry.description, subjectOf('Parameter', entry))
);

export const PR10 = entryCheck(
    'PR10',
    'Parameter headers have one space on each side of the colon.',
    (entry) =>
        [...entry.header.value.matchAll(BAD_COLON_SPACING)].map((match) => {
            const start = movePosition(entry.header.start, { column: match.index ?? 0 });
            return createDiagnostic('PR10', {
                start,
                end: movePosition(start, { column: match[0].length }),
                args: { parameter: entryName(entry) },
                suggestion: 'Insert a space before and/or after `:`.',
            });
        })
);

export const PR11 = entryCheck(
    'PR11',
    'Parameter descriptions have no leading blank lines.',
    (entry) => checkNoLeadingBlankLines('PR11', entry.description, subjectOf('Parameter', entry))
);

/**
 * Trailing blank lines of the last entry belong to the section end.
 */
export const PR12 = entryCheck(
    'PR12',
    'Parameter descriptions have no trailing blank lines.',
    (entry, index, count) =>
        index === count - 1
            ? []
            : checkNoTrailingBlankLines('PR12', entry.description, subjectOf('Parameter', entry))
);

export const PR13 = entryCheck('PR13', '`optional` appears at most once per parameter.', (entry) => {
    if (entry.optionalCount <= 1) {
        return [];
    }
    const token = entryToken(entry);
    return [
        createDiagnostic('PR13', {
            start: token.start,
            end: token.end,
            args: { parameter: token.value },
            suggestion: 'Remove duplicate `optional`.',
        }),
    ];
});
