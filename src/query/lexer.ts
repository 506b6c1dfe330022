/**
 * @file Query Lexer
 *
 * @module query/lexer
 */

import { QuerySyntaxError } from '../core/errors.js';
import type { Token, TokenKind } from './types.js';

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
    ['and', 'and'],
    ['or', 'or'],
    ['not', 'not'],
]);

const NUMBER_PATTERN: RegExp = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_PATTERN: RegExp = /[A-Za-z_][A-Za-z0-9_.]*/y;
const OPERATOR_PATTERN: RegExp = />=|<=|!=|==|=|<|>/y;

const ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
};

/**
 * Split a query string into tokens, always ending with an `eof` token.
 *
 * @throws {QuerySyntaxError} On an unterminated string or unknown character
 */
export function query_tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let index: number = 0;

    while (index < source.length) {
        const char: string = source[index];

        if (/\s/.test(char)) {
            index++;
            continue;
        }

        if (char === '(' || char === ')') {
            tokens.push({ kind: char === '(' ? 'lparen' : 'rparen', text: char, position: index, value: char });
            index++;
            continue;
        }

        if (char === '"' || char === "'") {
            const token: Token = string_read(source, index);
            tokens.push(token);
            index += token.text.length;
            continue;
        }

        const operator: string | null = pattern_match(OPERATOR_PATTERN, source, index);
        if (operator !== null) {
            tokens.push({ kind: 'operator', text: operator, position: index, value: operator === '==' ? '=' : operator });
            index += operator.length;
            continue;
        }

        const number: string | null = pattern_match(NUMBER_PATTERN, source, index);
        if (number !== null && !identifierChar_is(source[index + number.length])) {
            tokens.push({ kind: 'number', text: number, position: index, value: number });
            index += number.length;
            continue;
        }

        const word: string | null = pattern_match(IDENTIFIER_PATTERN, source, index);
        if (word !== null) {
            const lower: string = word.toLowerCase();
            if (lower === 'contains') {
                tokens.push({ kind: 'operator', text: word, position: index, value: 'contains' });
            } else {
                tokens.push({ kind: KEYWORDS.get(lower) ?? 'identifier', text: word, position: index, value: word });
            }
            index += word.length;
            continue;
        }

        throw new QuerySyntaxError(char, index, 'Unexpected character');
    }

    tokens.push({ kind: 'eof', text: '', position: source.length, value: '' });
    return tokens;
}

function pattern_match(pattern: RegExp, source: string, index: number): string | null {
    pattern.lastIndex = index;
    const match: RegExpExecArray | null = pattern.exec(source);
    return match ? match[0] : null;
}

function identifierChar_is(char: string | undefined): boolean {
    return char !== undefined && /[A-Za-z_]/.test(char);
}

/** Read a quoted string starting at `start`. Backslash escapes the next character. */
function string_read(source: string, start: number): Token {
    const quote: string = source[start];
    let value: string = '';
    let index: number = start + 1;

    while (index < source.length) {
        const char: string = source[index];
        if (char === '\\') {
            const next: string | undefined = source[index + 1];
            if (next === undefined) break;
            value += ESCAPES[next] ?? next;
            index += 2;
            continue;
        }
        if (char === quote) {
            return { kind: 'string', text: source.slice(start, index + 1), position: start, value };
        }
        value += char;
        index++;
    }

    throw new QuerySyntaxError(source.slice(start), start, 'Unterminated string');
}
