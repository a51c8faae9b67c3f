/**
 * @fileoverview Returns (RT01-RT05) and Yields (YD01) checks for functions
 * and methods.
 *
 * @module core/linter/checks/returns
 */

import type { CallableDeclaration } from '../../../types/declaration.js';
import type { DocString, ParameterEntry } from '../../../types/docstring.js';
import type { Check, Diagnostic } from '../../../types/lint.js';
import { createDiagnostic } from '../../catalog.js';
import { isCallable } from '../../declaration.js';
import {
    checkEndsWithPeriod,
    checkHasDescription,
    checkStartsUppercase,
    sectionEntries,
    subjectOf,
} from '../description.js';
import { docstringAnchor } from './global.js';

function callableCheck(
    id: Check['id'],
    description: string,
    validate: (declaration: CallableDeclaration, docstring: DocString) => Diagnostic[]
): Check {
    return {
        id,
        description,
        validate(declaration, docstring) {
            return isCallable(declaration) ? validate(declaration, docstring) : [];
        },
    };
}

function returnEntryCheck(
    id: Check['id'],
    description: string,
    validate: (entry: ParameterEntry) => Diagnostic[]
): Check {
    return callableCheck(id, description, (_declaration, docstring) =>
        sectionEntries(docstring, 'Returns').flatMap(validate)
    );
}

export const RT01 = callableCheck(
    'RT01',
    'Functions that return a value have a Returns section.',
    (declaration, docstring) => {
        if (declaration.returns === 0 || docstring.sections.has('Returns')) {
            return [];
        }
        return [
            createDiagnostic('RT01', {
                ...docstringAnchor(docstring),
                suggestion: 'Add a Returns section.',
            }),
        ];
    }
);

export const RT02 = callableCheck(
    'RT02',
    'A single return value is documented by its type only.',
    (_declaration, docstring) => {
        const [only, ...rest] = sectionEntries(docstring, 'Returns');
        if (only === undefined || rest.length > 0 || only.name === null) {
            return [];
        }
        return [
            createDiagnostic('RT02', {
                start: only.name.start,
                end: only.name.end,
                args: { name: only.name.value },
                suggestion: `Remove \`${only.name.value}\` and keep the type.`,
            }),
        ];
    }
);

export const RT03 = returnEntryCheck('RT03', 'Every return value has a description.', (entry) =>
    checkHasDescription('RT03', entry.description, subjectOf('Return', entry))
);

export const RT04 = returnEntryCheck(
    'RT04',
    'Return descriptions start with a capital letter.',
    (entry) => checkStartsUppercase('RT04', entry.description, subjectOf('Return', entry))
);

export const RT05 = returnEntryCheck(
    'RT05',
    'Return descriptions end with a period.',
    (entry) => checkEndsWithPeriod('RT05', entry.description, subjectOf('Return', entry))
);

export const YD01 = callableCheck(
    'YD01',
    'Generators have a Yields section.',
    (declaration, docstring) => {
        if (declaration.yields === 0 || docstring.sections.has('Yields')) {
            return [];
        }
        return [
            createDiagnostic('YD01', {
                ...docstringAnchor(docstring),
                suggestion: 'Add a Yields section.',
            }),
        ];
    }
);
