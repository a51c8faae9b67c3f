/**
 * @fileoverview Barrel export for all type definitions.
 *
 * @module types
 */

export type { Position, Span, Result, AsyncResult } from './base.js';

export type {
    RawDocstring,
    DocstringLine,
    Token,
    Paragraph,
    Summary,
    ParameterEntry,
    SeeAlsoName,
    SeeAlsoEntry,
    SectionContents,
    Section,
    DocString,
} from './docstring.js';

export type {
    ParameterArity,
    DeclaredParameter,
    ModuleDeclaration,
    ClassDeclaration,
    FunctionDeclaration,
    MethodDeclaration,
    ConstantDeclaration,
    Declaration,
    DeclarationKind,
    CallableDeclaration,
    ParameterizedDeclaration,
    FileManifest,
} from './declaration.js';

export type {
    ParserCode,
    CheckId,
    DiagnosticCode,
    Diagnostic,
    Check,
} from './lint.js';

export type { OutputFormat, LintConfig } from './config.js';
