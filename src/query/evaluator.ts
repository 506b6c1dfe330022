/**
 * @file Query Evaluator
 *
 * Evaluates an expression tree against one target. AND and OR
 * short-circuit. A comparison that is ill-typed for its field raises a
 * QueryTypeError internally, which is handed to the diagnostics callback
 * and turns that comparison into `false`; the rest of the expression still
 * evaluates. A comparison on a field the version lacks is `false` with no
 * diagnostic.
 *
 * @module query/evaluator
 */

import { QueryTypeError } from '../core/errors.js';
import { semanticCategory_is } from '../diff/types.js';
import { CHANGES_FIELD, field_resolve, type FieldValue } from './fields.js';
import type { ComparisonNode, ComparisonOperator, QueryDiagnostics, QueryExpression, QueryTarget, QueryValue } from './types.js';

export function query_evaluate(
    expression: QueryExpression,
    target: QueryTarget,
    diagnostics?: QueryDiagnostics,
): boolean {
    switch (expression.type) {
        case 'and':
            return query_evaluate(expression.left, target, diagnostics)
                && query_evaluate(expression.right, target, diagnostics);
        case 'or':
            return query_evaluate(expression.left, target, diagnostics)
                || query_evaluate(expression.right, target, diagnostics);
        case 'not':
            return !query_evaluate(expression.operand, target, diagnostics);
        case 'comparison':
            try {
                return comparison_evaluate(expression, target);
            } catch (error: unknown) {
                if (error instanceof QueryTypeError) {
                    diagnostics?.(error);
                    return false;
                }
                throw error;
            }
    }
}

/**
 * @throws {QueryTypeError} When the operator or value does not fit the field's type
 */
export function comparison_evaluate(node: ComparisonNode, target: QueryTarget): boolean {
    const field: FieldValue | null = field_resolve(node.field, target);
    if (field === null) return false;

    const mismatch = (reason: string): QueryTypeError => new QueryTypeError(node.field, node.operator, reason);

    switch (field.kind) {
        case 'number': {
            if (node.operator === 'contains') throw mismatch('numeric field does not support contains');
            if (node.value.kind !== 'number') throw mismatch(`expected a number, got ${value_describe(node.value)}`);
            return ordered_compare(field.value, node.value.value, node.operator);
        }
        case 'date': {
            if (node.operator === 'contains') throw mismatch('date field does not support contains');
            const instant: number = node.value.kind === 'number' ? node.value.value : Date.parse(node.value.value);
            if (Number.isNaN(instant)) throw mismatch(`'${node.value.value}' is not a date`);
            return ordered_compare(field.value, instant, node.operator);
        }
        case 'string': {
            if (node.value.kind === 'number') throw mismatch(`text field compared with number ${node.value.value}`);
            if (node.operator === 'contains') return field.value.includes(node.value.value);
            return ordered_compare(field.value, node.value.value, node.operator);
        }
        case 'list': {
            if (node.operator !== 'contains') throw mismatch('list field only supports contains');
            const member: string = String(node.value.value);
            if (node.field === CHANGES_FIELD && !semanticCategory_is(member)) {
                throw mismatch(`'${member}' is not a semantic category`);
            }
            return field.value.includes(member);
        }
    }
}

function ordered_compare<T extends number | string>(left: T, right: T, operator: Exclude<ComparisonOperator, 'contains'>): boolean {
    switch (operator) {
        case '=':
            return left === right;
        case '!=':
            return left !== right;
        case '>':
            return left > right;
        case '<':
            return left < right;
        case '>=':
            return left >= right;
        case '<=':
            return left <= right;
    }
}

function value_describe(value: QueryValue): string {
    return value.kind === 'number' ? String(value.value) : `'${value.value}'`;
}
