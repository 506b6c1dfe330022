/**
 * @file Query Parser
 *
 * Recursive-descent parser over the token stream. Precedence from tightest
 * to loosest is NOT, AND, OR; AND and OR are left-associative.
 *
 * @module query/parser
 */

import { QuerySyntaxError } from '../core/errors.js';
import { query_tokenize } from './lexer.js';
import type { ComparisonNode, ComparisonOperator, QueryExpression, QueryValue, Token, TokenKind } from './types.js';
import { COMPARISON_OPERATORS } from './types.js';

/**
 * Parse a query string into an expression tree.
 *
 * @throws {QuerySyntaxError} Naming the offending token and its position
 */
export function query_parse(source: string): QueryExpression {
    const parser: Parser = new Parser(query_tokenize(source));
    return parser.query_parse();
}

class Parser {
    private index: number = 0;

    constructor(private readonly tokens: Token[]) {}

    query_parse(): QueryExpression {
        if (this.peek().kind === 'eof') {
            throw this.error_at(this.peek(), 'Empty query');
        }
        const expression: QueryExpression = this.or_parse();
        const trailing: Token = this.peek();
        if (trailing.kind !== 'eof') {
            throw this.error_at(trailing, 'Unexpected token');
        }
        return expression;
    }

    private or_parse(): QueryExpression {
        let left: QueryExpression = this.and_parse();
        while (this.peek().kind === 'or') {
            this.advance();
            left = { type: 'or', left, right: this.and_parse() };
        }
        return left;
    }

    private and_parse(): QueryExpression {
        let left: QueryExpression = this.unary_parse();
        while (this.peek().kind === 'and') {
            this.advance();
            left = { type: 'and', left, right: this.unary_parse() };
        }
        return left;
    }

    private unary_parse(): QueryExpression {
        if (this.peek().kind === 'not') {
            this.advance();
            return { type: 'not', operand: this.unary_parse() };
        }
        return this.primary_parse();
    }

    private primary_parse(): QueryExpression {
        if (this.peek().kind === 'lparen') {
            this.advance();
            const inner: QueryExpression = this.or_parse();
            this.expect('rparen', "Expected ')'");
            return inner;
        }
        return this.comparison_parse();
    }

    private comparison_parse(): ComparisonNode {
        const field: Token = this.expect('identifier', 'Expected field name');
        const operator: Token = this.expect('operator', 'Expected comparison operator');
        const value: QueryValue = this.value_parse();
        return {
            type: 'comparison',
            field: field.value,
            operator: operator_narrow(operator),
            value,
            position: field.position,
        };
    }

    private value_parse(): QueryValue {
        const token: Token = this.peek();
        switch (token.kind) {
            case 'string':
                this.advance();
                return { kind: 'string', value: token.value };
            case 'number':
                this.advance();
                return { kind: 'number', value: Number(token.value) };
            case 'identifier':
                this.advance();
                return { kind: 'identifier', value: token.value };
            default:
                throw this.error_at(token, 'Expected value');
        }
    }

    private peek(): Token {
        return this.tokens[Math.min(this.index, this.tokens.length - 1)];
    }

    private advance(): Token {
        const token: Token = this.peek();
        if (token.kind !== 'eof') this.index++;
        return token;
    }

    private expect(kind: TokenKind, detail: string): Token {
        const token: Token = this.peek();
        if (token.kind !== kind) {
            throw this.error_at(token, detail);
        }
        return this.advance();
    }

    private error_at(token: Token, detail: string): QuerySyntaxError {
        return new QuerySyntaxError(token.kind === 'eof' ? '<end of input>' : token.text, token.position, detail);
    }
}

function operator_narrow(token: Token): ComparisonOperator {
    const match: ComparisonOperator | undefined = COMPARISON_OPERATORS.find(
        (operator: ComparisonOperator): boolean => operator === token.value,
    );
    if (!match) {
        throw new QuerySyntaxError(token.text, token.position, 'Unknown operator');
    }
    return match;
}
