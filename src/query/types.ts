/**
 * @file Query Type Definitions
 *
 * Tokens, the expression tree, and the evaluation target of the history
 * query language:
 *
 *   expr       := and_expr ("OR" and_expr)*
 *   and_expr   := unary ("AND" unary)*
 *   unary      := "NOT" unary | primary
 *   primary    := comparison | "(" expr ")"
 *   comparison := field operator value
 *
 * Keywords are case-insensitive. A parsed expression is immutable.
 *
 * @module query
 */

import type { QueryTypeError } from '../core/errors.js';
import type { SemanticDiff } from '../diff/types.js';
import type { Version } from '../history/types.js';

// ─── Tokens ─────────────────────────────────────────────────────

export type TokenKind =
    | 'lparen'
    | 'rparen'
    | 'and'
    | 'or'
    | 'not'
    | 'operator'
    | 'string'
    | 'number'
    | 'identifier'
    | 'eof';

/**
 * @property text - Source text of the token as written (quotes included)
 * @property position - 0-based offset of the token's first character
 * @property value - Decoded string value or normalized operator
 */
export interface Token {
    kind: TokenKind;
    text: string;
    position: number;
    value: string;
}

// ─── Expression Tree ────────────────────────────────────────────

export const COMPARISON_OPERATORS = ['>', '<', '>=', '<=', '=', '!=', 'contains'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type QueryValue =
    | { kind: 'string'; value: string }
    | { kind: 'number'; value: number }
    | { kind: 'identifier'; value: string };

export interface ComparisonNode {
    type: 'comparison';
    field: string;
    operator: ComparisonOperator;
    value: QueryValue;
    position: number;
}

export interface NotNode {
    type: 'not';
    operand: QueryExpression;
}

export interface BinaryNode {
    type: 'and' | 'or';
    left: QueryExpression;
    right: QueryExpression;
}

export type QueryExpression = ComparisonNode | NotNode | BinaryNode;

// ─── Evaluation ─────────────────────────────────────────────────

/**
 * What a query is evaluated against. `content` and `changes` are only
 * loaded by the caller when the query references them.
 *
 * @property changes - Diff against the previous version (the empty text for version 1)
 */
export interface QueryTarget {
    version: Version;
    content?: string;
    changes?: SemanticDiff;
}

/** Receives every comparison that degraded to false on a type error. */
export type QueryDiagnostics = (error: QueryTypeError) => void;

export interface CompiledQuery {
    readonly source: string;
    readonly ast: QueryExpression;
    /** Field names referenced anywhere in the expression. */
    readonly fields: ReadonlySet<string>;
    matches(target: QueryTarget, diagnostics?: QueryDiagnostics): boolean;
    usesContent(): boolean;
    usesChanges(): boolean;
}
