/**
 * @fileoverview Derived facts about declarations: privacy, magic names,
 * and which kinds carry parameters.
 *
 * @module core/declaration
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type {
    CallableDeclaration,
    Declaration,
    ParameterizedDeclaration,
} from '../types/declaration.js';

// ============================================================
// Magic Method Table
// ============================================================

const MAGIC_METHODS_FILE = new URL('../../data/magic-methods.json', import.meta.url);

const MagicMethodsSchema = z.array(z.string().regex(/^__\w+__$/));

let magicMethods: ReadonlySet<string> | null = null;

function loadMagicMethods(): ReadonlySet<string> {
    if (magicMethods === null) {
        const json: unknown = JSON.parse(readFileSync(MAGIC_METHODS_FILE, 'utf-8'));
        magicMethods = new Set(MagicMethodsSchema.parse(json));
    }
    return magicMethods;
}

// ============================================================
// Name Predicates
// ============================================================

/**
 * The declared name; modules have none.
 */
export function declarationName(declaration: Declaration): string | null {
    return declaration.kind === 'module' ? null : declaration.name;
}

/**
 * True for dunder names from the magic method table, such as `__init__`.
 */
export function isMagic(declaration: Declaration): boolean {
    const name = declarationName(declaration);
    return name !== null && loadMagicMethods().has(name);
}

/**
 * True for names starting with an underscore that are not magic.
 */
export function isPrivate(declaration: Declaration): boolean {
    const name = declarationName(declaration);
    return name !== null && name.startsWith('_') && !isMagic(declaration);
}

// ============================================================
// Kind Predicates
// ============================================================

export function isCallable(declaration: Declaration): declaration is CallableDeclaration {
    switch (declaration.kind) {
        case 'function':
        case 'method':
            return true;
        case 'module':
        case 'class':
        case 'constant':
            return false;
    }
}

export function hasParameters(
    declaration: Declaration
): declaration is ParameterizedDeclaration {
    return declaration.kind === 'class' || isCallable(declaration);
}
