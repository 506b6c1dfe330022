/**
 * @file Semantic Diff Type Definitions
 *
 * A SemanticDiff is derived data: recomputed on demand from two blobs and
 * never the source of truth. Any component that can produce one (the
 * built-in heuristic engine or a pluggable analyzer) satisfies the same
 * SemanticAnalyzer contract, and consumers never ask which one ran.
 *
 * @module diff
 */

// ─── Categories ─────────────────────────────────────────────────

/** Fixed category order; entries in a SemanticDiff always follow it. */
export const SEMANTIC_CATEGORIES = [
    'tone',
    'constraints',
    'examples',
    'structure',
    'variables',
    'context',
] as const;

export type SemanticCategory = (typeof SEMANTIC_CATEGORIES)[number];

export function semanticCategory_is(value: string): value is SemanticCategory {
    return SEMANTIC_CATEGORIES.some((category: string): boolean => category === value);
}

// ─── Spans ──────────────────────────────────────────────────────

export type SpanKind = 'insert' | 'delete' | 'replace';

/**
 * One contiguous run of changed lines between two aligned regions.
 *
 * @property kind - insert (only added lines), delete (only removed), replace (both)
 * @property removed - Lines present in the old blob only
 * @property added - Lines present in the new blob only
 * @property oldStart - 0-based line index in the old blob where the span begins
 * @property newStart - 0-based line index in the new blob where the span begins
 */
export interface DiffSpan {
    kind: SpanKind;
    removed: readonly string[];
    added: readonly string[];
    oldStart: number;
    newStart: number;
}

// ─── Semantic Diff ──────────────────────────────────────────────

/**
 * All changes attributed to one category.
 *
 * @property magnitude - Fraction in [0,1] of all changed tokens that fall in this category
 * @property spans - The spans classified into this category, in document order
 */
export interface SemanticDiffEntry {
    category: SemanticCategory;
    description: string;
    magnitude: number;
    linesAdded: number;
    linesRemoved: number;
    spans: readonly DiffSpan[];
}

/**
 * @property entries - At most one entry per category, in SEMANTIC_CATEGORIES order
 * @property tokensChanged - Total changed tokens across all spans
 */
export interface SemanticDiff {
    entries: readonly SemanticDiffEntry[];
    tokensChanged: number;
}

export const EMPTY_SEMANTIC_DIFF: SemanticDiff = Object.freeze({
    entries: Object.freeze([]),
    tokensChanged: 0,
});

// ─── Analyzer Contract ──────────────────────────────────────────

/**
 * Anything that can categorize the change between two blobs. Must be pure
 * and deterministic; `categorize(x, x)` must return an empty diff.
 */
export interface SemanticAnalyzer {
    categorize(before: string, after: string): SemanticDiff;
}

export function semanticDiff_isEmpty(diff: SemanticDiff): boolean {
    return diff.entries.length === 0;
}

export function semanticDiff_categories(diff: SemanticDiff): SemanticCategory[] {
    return diff.entries.map((entry: SemanticDiffEntry): SemanticCategory => entry.category);
}

export function semanticDiff_entry(diff: SemanticDiff, category: SemanticCategory): SemanticDiffEntry | null {
    return diff.entries.find((entry: SemanticDiffEntry): boolean => entry.category === category) ?? null;
}
