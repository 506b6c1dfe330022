/**
 * @file Query Printer
 *
 * Renders an expression tree back to query text that parses to the same
 * tree. Parentheses appear only where precedence or associativity needs
 * them.
 *
 * @module query/printer
 */

import type { QueryExpression, QueryValue } from './types.js';

const PRECEDENCE: Record<QueryExpression['type'], number> = {
    or: 1,
    and: 2,
    not: 3,
    comparison: 4,
};

export function query_print(expression: QueryExpression): string {
    switch (expression.type) {
        case 'comparison':
            return `${expression.field} ${expression.operator} ${value_print(expression.value)}`;
        case 'not':
            return `NOT ${operand_print(expression.operand, PRECEDENCE.not)}`;
        case 'and':
        case 'or': {
            const own: number = PRECEDENCE[expression.type];
            const keyword: string = expression.type.toUpperCase();
            // Right operand at equal precedence is grouped to keep left-associativity.
            return `${operand_print(expression.left, own)} ${keyword} ${operand_print(expression.right, own + 1)}`;
        }
    }
}

function operand_print(expression: QueryExpression, minimum: number): string {
    const text: string = query_print(expression);
    return PRECEDENCE[expression.type] < minimum ? `(${text})` : text;
}

export function value_print(value: QueryValue): string {
    switch (value.kind) {
        case 'string':
            return string_quote(value.value);
        case 'number':
            if (Number.isFinite(value.value)) return String(value.value);
            return value.value > 0 ? '1e999' : '-1e999';
        case 'identifier':
            return value.value;
    }
}

/** Single-quote a string, escaping backslashes, quotes and control characters the lexer decodes. */
export function string_quote(text: string): string {
    const escaped: string = text
        .replace(/\\/g, '\\\\')
        .replace(/'/g, "\\'")
        .replace(/\n/g, '\\n')
        .replace(/\t/g, '\\t')
        .replace(/\r/g, '\\r');
    return `'${escaped}'`;
}
