/**
 * @fileoverview Declaration model consumed by the linter.
 * Declarations are produced by a source extractor outside this package and
 * reach the linter through the manifest decoder.
 *
 * @module types/declaration
 */

import type { Span } from './base.js';
import type { RawDocstring } from './docstring.js';

// ============================================================
// Parameters
// ============================================================

/**
 * - positional: `x`, `x=1`, `x: int`
 * - varargs: `*args`
 * - kwargs: `**kwargs`
 */
export type ParameterArity = 'positional' | 'varargs' | 'kwargs';

/**
 * A parameter as declared in a signature.
 * The span covers the whole parameter, including annotation and default.
 */
export interface DeclaredParameter extends Span {
    /** Bare name, without stars */
    readonly name: string;
    readonly default: string | null;
    readonly annotation: string | null;
    readonly arity: ParameterArity;
}

// ============================================================
// Declarations
// ============================================================

interface DeclarationBase extends Span {
    readonly docstring: RawDocstring | null;
    /** Codes or check ids named by an inline `noqa` comment */
    readonly noqa: readonly string[];
}

export interface ModuleDeclaration extends DeclarationBase {
    readonly kind: 'module';
}

export interface ClassDeclaration extends DeclarationBase {
    readonly kind: 'class';
    readonly name: string;
    /** Constructor parameters, receiver excluded */
    readonly parameters: readonly DeclaredParameter[];
}

interface CallableFields extends DeclarationBase {
    readonly name: string;
    /** Receiver excluded for methods */
    readonly parameters: readonly DeclaredParameter[];
    /** Number of return statements */
    readonly returns: number;
    /** Number of yield expressions */
    readonly yields: number;
    /** Number of raise statements */
    readonly raises: number;
}

export interface FunctionDeclaration extends CallableFields {
    readonly kind: 'function';
}

export interface MethodDeclaration extends CallableFields {
    readonly kind: 'method';
}

export interface ConstantDeclaration extends DeclarationBase {
    readonly kind: 'constant';
    readonly name: string;
}

/**
 * Closed union of every declaration kind the linter understands.
 */
export type Declaration =
    | ModuleDeclaration
    | ClassDeclaration
    | FunctionDeclaration
    | MethodDeclaration
    | ConstantDeclaration;

export type DeclarationKind = Declaration['kind'];

export type CallableDeclaration = FunctionDeclaration | MethodDeclaration;

/**
 * Declarations whose signature carries parameters.
 */
export type ParameterizedDeclaration = ClassDeclaration | CallableDeclaration;

// ============================================================
// Manifest
// ============================================================

/**
 * The declarations of one source file, as handed over by an extractor.
 */
export interface FileManifest {
    /** Path reported in diagnostics */
    readonly path: string;
    /** Full source text, used for source context in detailed output */
    readonly source: string | null;
    readonly declarations: readonly Declaration[];
}
