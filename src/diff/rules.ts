/**
 * @file Classification Rules
 *
 * Ordered rule table mapping a changed span to exactly one semantic
 * category. Rules are evaluated top to bottom and the first match wins;
 * the last rule matches everything. The table is plain data so each rule
 * can be tested on its own and the order audited at a glance.
 *
 * @module diff/rules
 */

import type { DiffSpan, SemanticCategory } from './types.js';

export interface ClassificationRule {
    name: string;
    category: SemanticCategory;
    matches(span: DiffSpan): boolean;
}

// ─── Patterns ───────────────────────────────────────────────────

const CONSTRAINT_PATTERN: RegExp =
    /\b(?:must(?:\s+not)?|never|only|always|do\s+not|don't|cannot|can't|should\s+not|shouldn't|at\s+(?:most|least)|no\s+more\s+than|limit(?:ed)?\s+to|maximum|minimum|exactly|strictly|required|prohibited|forbidden)\b/i;

const EXAMPLE_LINE_PATTERN: RegExp =
    /^\s*(?:examples?\b|e\.g\.|for\s+(?:example|instance)\b|(?:input|output|user|assistant|q|a)\s*:)/i;
const EXAMPLE_BLOCK_PATTERN: RegExp = /^\s*(?:```|<\/?examples?>)/i;
const EXAMPLE_PAIR_PATTERN: RegExp = /\S\s*(?:->|=>|→)\s*\S/;

const MARKER_PATTERN: RegExp = /^\s*(#{1,6}(?=\s)|[-*+](?=\s)|\d+[.)](?=\s)|[A-Za-z][.)](?=\s)|-{3,}\s*$|={3,}\s*$)/;

const VARIABLE_PATTERN: RegExp = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)/g;

const REGISTER_PATTERN: RegExp =
    /\b(?:friendly|formal|informal|casual|professional|polite|warm|cheerful|enthusiastic|empathetic|playful|serious|respectful|concise|verbose|humorous|witty|confident|gentle|kind|rude|blunt|encouraging|supportive|calm|neutral|upbeat|tone|voice)\b/i;
const DIRECT_ADDRESS_PATTERN: RegExp = /\b(?:you\s+are|you're|you\s+will|your|please|thank\s+you)\b/i;

// ─── Span Helpers ───────────────────────────────────────────────

function span_lines(span: DiffSpan): readonly string[] {
    return [...span.removed, ...span.added];
}

function lines_some(span: DiffSpan, pattern: RegExp): boolean {
    return span_lines(span).some((line: string): boolean => pattern.test(line));
}

/** Sorted multiset key, so two sides compare equal regardless of order. */
function multiset_key(items: string[]): string {
    return [...items].sort().join('\u0000');
}

function markers_collect(lines: readonly string[]): string[] {
    const markers: string[] = [];
    for (const line of lines) {
        const match: RegExpExecArray | null = MARKER_PATTERN.exec(line);
        if (match) markers.push(match[1].trim());
    }
    return markers;
}

function variables_collect(lines: readonly string[]): string[] {
    const names: string[] = [];
    for (const line of lines) {
        for (const match of line.matchAll(VARIABLE_PATTERN)) {
            names.push(match[1]);
        }
    }
    return names;
}

// ─── Rule Table ─────────────────────────────────────────────────

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        name: 'imperative-limits',
        category: 'constraints',
        matches: (span: DiffSpan): boolean => lines_some(span, CONSTRAINT_PATTERN),
    },
    {
        name: 'example-blocks',
        category: 'examples',
        matches: (span: DiffSpan): boolean =>
            lines_some(span, EXAMPLE_LINE_PATTERN)
            || lines_some(span, EXAMPLE_BLOCK_PATTERN)
            || lines_some(span, EXAMPLE_PAIR_PATTERN),
    },
    {
        name: 'list-and-heading-markers',
        category: 'structure',
        matches: (span: DiffSpan): boolean =>
            multiset_key(markers_collect(span.removed)) !== multiset_key(markers_collect(span.added)),
    },
    {
        name: 'template-variables',
        category: 'variables',
        matches: (span: DiffSpan): boolean =>
            multiset_key(variables_collect(span.removed)) !== multiset_key(variables_collect(span.added)),
    },
    {
        name: 'register-and-address',
        category: 'tone',
        matches: (span: DiffSpan): boolean =>
            lines_some(span, REGISTER_PATTERN) || lines_some(span, DIRECT_ADDRESS_PATTERN),
    },
    {
        name: 'catch-all',
        category: 'context',
        matches: (): boolean => true,
    },
];

/**
 * Classify a span with the given rule table.
 *
 * @returns The category of the first matching rule, or 'context' if none match
 */
export function span_classify(
    span: DiffSpan,
    rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): SemanticCategory {
    for (const rule of rules) {
        if (rule.matches(span)) return rule.category;
    }
    return 'context';
}
