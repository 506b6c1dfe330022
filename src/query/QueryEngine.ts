/**
 * @file Query Engine
 *
 * Compiles query text once and evaluates it against many versions. The
 * compiled form records which fields the expression reads, so a caller can
 * skip loading blob content or computing diffs the query never looks at.
 *
 * @module query/QueryEngine
 */

import { query_evaluate } from './evaluator.js';
import { CHANGES_FIELD, CONTENT_FIELD } from './fields.js';
import { query_parse } from './parser.js';
import { query_print } from './printer.js';
import type { CompiledQuery, QueryDiagnostics, QueryExpression, QueryTarget } from './types.js';

export class Query implements CompiledQuery {
    readonly fields: ReadonlySet<string>;

    constructor(
        readonly source: string,
        readonly ast: QueryExpression,
    ) {
        this.fields = fields_collect(ast);
    }

    matches(target: QueryTarget, diagnostics?: QueryDiagnostics): boolean {
        return query_evaluate(this.ast, target, diagnostics);
    }

    usesContent(): boolean {
        return this.fields.has(CONTENT_FIELD);
    }

    usesChanges(): boolean {
        return this.fields.has(CHANGES_FIELD);
    }

    /** Canonical text of the expression. */
    toString(): string {
        return query_print(this.ast);
    }
}

/**
 * Parse and compile query text.
 *
 * @throws {QuerySyntaxError} If the text does not parse
 */
export function query_compile(source: string): CompiledQuery {
    return new Query(source, query_parse(source));
}

export function fields_collect(expression: QueryExpression, into: Set<string> = new Set()): Set<string> {
    switch (expression.type) {
        case 'comparison':
            into.add(expression.field);
            break;
        case 'not':
            fields_collect(expression.operand, into);
            break;
        case 'and':
        case 'or':
            fields_collect(expression.left, into);
            fields_collect(expression.right, into);
            break;
    }
    return into;
}
