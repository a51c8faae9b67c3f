/**
 * @fileoverview Parser for Parameters-like sections: `name : type` headers
 * followed by indented descriptions.
 *
 * @module core/docstring/parameters
 */

import type { DocstringLine, ParameterEntry, Token } from '../../types/docstring.js';
import { movePosition } from '../../utils/position.js';
import { dedent, isBlank, leadingWhitespace, lineEnd, paragraphOf, startsIndented } from './lines.js';
import { LineReader } from './reader.js';
import { tokenizeTypes } from './types.js';

/**
 * Parses a section body into entries.
 *
 * @param body - Section lines after the underline
 * @param indent - Base indentation of the docstring, stripped from every line
 * @param singleElementIsType - Read a header without a colon as a bare type
 *   (Returns, Yields, Raises, Warns, Receives)
 */
export function parseParameterList(
    body: readonly DocstringLine[],
    indent: number,
    singleElementIsType: boolean
): ParameterEntry[] {
    const reader = new LineReader(body.map((line) => dedent(line, indent)));
    const entries: ParameterEntry[] = [];

    while (!reader.eof()) {
        const header = reader.read();
        if (header === null || isBlank(header)) {
            continue;
        }
        const description = reader.readWhile((line) => isBlank(line) || startsIndented(line));
        entries.push(parseEntry(header, description, singleElementIsType));
    }

    return entries;
}

function parseEntry(
    header: DocstringLine,
    description: readonly DocstringLine[],
    singleElementIsType: boolean
): ParameterEntry {
    const text = header.text;
    const lead = leadingWhitespace(text);
    const colon = text.indexOf(':', lead);

    const headerToken = tokenAt(header, lead, text.trim());
    const nameText = (colon === -1 ? text.slice(lead) : text.slice(lead, colon)).trimEnd();
    const name = nameText === '' ? null : tokenAt(header, lead, nameText);

    let types: Token[] | null = null;
    let optionalCount = 0;

    if (colon !== -1) {
        const typeText = text.slice(colon + 1);
        const list = tokenizeTypes(typeText);
        optionalCount = list.optionalCount;
        if (typeText.trim() !== '') {
            types = list.tokens.map((token) => tokenAt(header, colon + 1 + token.start, token.value));
        }
    } else if (singleElementIsType && name !== null) {
        return {
            header: headerToken,
            name: null,
            types: [name],
            optionalCount,
            description: paragraphOf(description, lineEnd(header)),
        };
    }

    return {
        header: headerToken,
        name,
        types,
        optionalCount,
        description: paragraphOf(description, lineEnd(header)),
    };
}

function tokenAt(line: DocstringLine, offset: number, value: string): Token {
    const start = movePosition(line.position, { column: offset });
    return { value, start, end: movePosition(start, { column: value.length }) };
}
