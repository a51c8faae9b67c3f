/**
 * @fileoverview Document model for parsed numpydoc docstrings.
 * Every node keeps the absolute source position of the text it came from.
 * Imports from types/base.ts only.
 *
 * @module types/docstring
 */

import type { Position, Span } from './base.js';

// ============================================================
// Raw Input
// ============================================================

/**
 * A docstring literal as found in the source, before parsing.
 */
export interface RawDocstring extends Span {
    /** Text between the opening and closing delimiters */
    readonly text: string;
    /** Indentation width of the declaration body holding the literal */
    readonly indent: number;
    /** Opening delimiter as written, including any string prefix (e.g. `r"""`) */
    readonly delimiter: string;
}

// ============================================================
// Positioned Text
// ============================================================

/**
 * One physical line of a docstring.
 * `position` is where `text[0]` sits in the source file.
 */
export interface DocstringLine {
    readonly text: string;
    readonly position: Position;
}

/**
 * A positioned piece of text: a section name, a parameter name,
 * a type, a cross-reference.
 */
export interface Token extends Span {
    readonly value: string;
}

/**
 * A run of lines. Blank lines inside the run are kept.
 */
export interface Paragraph extends Span {
    readonly lines: readonly DocstringLine[];
}

// ============================================================
// Summary
// ============================================================

export interface Summary {
    /** The one-line (ideally) short summary */
    readonly content: Paragraph;
    /** Everything between the summary and the first section */
    readonly extendedContent: Paragraph | null;
}

// ============================================================
// Sections
// ============================================================

/**
 * A `name : type` entry of a Parameters-like section.
 */
export interface ParameterEntry {
    /** The whole header line, without indentation */
    readonly header: Token;
    /** Null when the header only carries a type (single-element Returns entries) */
    readonly name: Token | null;
    /** Null when no type is given */
    readonly types: readonly Token[] | null;
    /** How many times the `optional` marker appears in the type list */
    readonly optionalCount: number;
    readonly description: Paragraph;
}

export interface SeeAlsoName {
    readonly name: Token;
    /** Sphinx role of a backquoted reference, e.g. `func` in ``:func:`f` `` */
    readonly role: string | null;
}

export interface SeeAlsoEntry {
    readonly names: readonly SeeAlsoName[];
    readonly description: Paragraph | null;
}

/**
 * Parsed body of a section, by section taxonomy.
 */
export type SectionContents =
    | { readonly kind: 'parameters'; readonly entries: readonly ParameterEntry[] }
    | { readonly kind: 'see-also'; readonly entries: readonly SeeAlsoEntry[] }
    | { readonly kind: 'text'; readonly lines: readonly DocstringLine[] };

/**
 * A titled section. The span bounds the section body.
 */
export interface Section extends Span {
    readonly name: Token;
    /** False when the underline length differs from the header length */
    readonly validUnderline: boolean;
    /** True for the `.. index::` pseudo-section */
    readonly directive: boolean;
    readonly contents: SectionContents;
}

// ============================================================
// DocString
// ============================================================

/**
 * The parsed docstring of one declaration. Built once, never mutated.
 */
export interface DocString extends Span {
    /** Where the body starts, right after the opening delimiter */
    readonly contentStart: Position;
    readonly indent: number;
    readonly raw: string;
    readonly lines: readonly DocstringLine[];
    /** Null when the docstring is blank or opens with a section */
    readonly summary: Summary | null;
    /** Sections in source order; the first occurrence of a name wins */
    readonly sections: ReadonlyMap<string, Section>;
}
