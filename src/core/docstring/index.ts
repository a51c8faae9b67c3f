/**
 * @fileoverview Barrel export for the docstring parser.
 *
 * @module core/docstring
 */

export { parseDocstring } from './parse.js';
export type { ParseResult } from './parse.js';
export { LineReader, isIndexDirective, isUnderline } from './reader.js';
export { INDEX_SECTION } from './sections.js';
export { tokenizeTypes } from './types.js';
export type { TypeToken, TypeList } from './types.js';
export {
    splitLines,
    contentStartOf,
    isBlank,
    lineEnd,
    firstCharacter,
    paragraphOf,
    countLeadingBlankLines,
    countTrailingBlankLines,
} from './lines.js';
