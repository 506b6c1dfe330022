/**
 * @file Query Patterns
 *
 * Builders for frequently used queries. Values are quoted with the same
 * escaping the printer uses, so any text is safe to pass.
 *
 * @module query/patterns
 */

import type { SemanticCategory } from '../diff/types.js';
import { string_quote } from './printer.js';

export const QueryPatterns = {
    highSuccessRate(minRate: number = 0.9): string {
        return `success_rate >= ${minRate}`;
    },

    lowLatency(maxMs: number = 500): string {
        return `avg_latency_ms < ${maxMs}`;
    },

    hasTag(tag: string): string {
        return `tags contains ${string_quote(tag)}`;
    },

    /** `date` is any string Date.parse accepts, e.g. `2024-01-31`. */
    createdAfter(date: string): string {
        return `created_at > ${string_quote(date)}`;
    },

    contentMatches(text: string): string {
        return `content contains ${string_quote(text)}`;
    },

    byAuthor(author: string): string {
        return `author = ${string_quote(author)}`;
    },

    changedCategory(category: SemanticCategory): string {
        return `changes contains ${string_quote(category)}`;
    },

    /** AND-join queries, parenthesizing each. */
    all(...queries: string[]): string {
        return queries.map((query: string): string => `(${query})`).join(' AND ');
    },

    /** OR-join queries, parenthesizing each. */
    any(...queries: string[]): string {
        return queries.map((query: string): string => `(${query})`).join(' OR ');
    },
} as const;
