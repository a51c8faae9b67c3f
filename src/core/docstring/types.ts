/**
 * @fileoverview Tokenizer for the type part of a `name : type` header.
 *
 * Grammar, from tightest to loosest binding:
 * 1. brackets `{...}`, `(...)`, `[...]` nest and are never split inside;
 * 2. the word `or`, delimited by whitespace, separates alternatives;
 * 3. a comma separates alternatives.
 * Both separators only count at nesting depth 0.
 *
 * @module core/docstring/types
 */

// ============================================================
// Types
// ============================================================

/**
 * A type token with offsets relative to the tokenized text.
 */
export interface TypeToken {
    readonly value: string;
    readonly start: number;
    readonly end: number;
}

export interface TypeList {
    readonly tokens: readonly TypeToken[];
    /** Occurrences of the bare `optional` marker, which is not a type */
    readonly optionalCount: number;
}

// ============================================================
// Constants
// ============================================================

const OPENING = '{([';
const CLOSING = '})]';
const OPTIONAL = 'optional';

// ============================================================
// Tokenizer
// ============================================================

/**
 * @example
 * tokenizeTypes('{"a", "b"} or int, optional');
 * // tokens: '{"a", "b"}' (0-10), 'int' (14-17); optionalCount: 1
 */
export function tokenizeTypes(text: string): TypeList {
    const tokens: TypeToken[] = [];
    let optionalCount = 0;

    for (const [from, to] of splitTopLevel(text)) {
        const raw = text.slice(from, to);
        const value = raw.trim();
        if (value === '') {
            continue;
        }
        if (value === OPTIONAL) {
            optionalCount++;
            continue;
        }
        const start = from + (raw.length - raw.trimStart().length);
        tokens.push({ value, start, end: start + value.length });
    }

    return { tokens, optionalCount };
}

function splitTopLevel(text: string): Array<[number, number]> {
    const segments: Array<[number, number]> = [];
    let depth = 0;
    let segmentStart = 0;

    for (let i = 0; i < text.length; i++) {
        const ch = text.charAt(i);
        if (OPENING.includes(ch)) {
            depth++;
        } else if (CLOSING.includes(ch)) {
            depth = Math.max(0, depth - 1);
        } else if (depth === 0 && ch === ',') {
            segments.push([segmentStart, i]);
            segmentStart = i + 1;
        } else if (depth === 0 && isConnectiveAt(text, i)) {
            segments.push([segmentStart, i]);
            segmentStart = i + 2;
            i++;
        }
    }
    segments.push([segmentStart, text.length]);

    return segments;
}

function isConnectiveAt(text: string, index: number): boolean {
    if (!text.startsWith('or', index)) {
        return false;
    }
    const before = index === 0 ? ' ' : text.charAt(index - 1);
    const after = index + 2 >= text.length ? ' ' : text.charAt(index + 2);
    return /\s/.test(before) && /\s/.test(after);
}
