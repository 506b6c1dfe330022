/**
 * @file Semantic Diff Engine
 *
 * Heuristic SemanticAnalyzer: aligns two blobs line by line, classifies
 * every changed span with the ordered rule table, and aggregates spans per
 * category. A category's magnitude is its share of all changed tokens.
 *
 * Pure and deterministic: no clock, no randomness, no I/O.
 *
 * @module diff/SemanticDiffEngine
 */

import { spanTokens_count, spans_compute } from './alignment.js';
import { CLASSIFICATION_RULES, span_classify, type ClassificationRule } from './rules.js';
import {
    EMPTY_SEMANTIC_DIFF,
    SEMANTIC_CATEGORIES,
    type DiffSpan,
    type SemanticAnalyzer,
    type SemanticCategory,
    type SemanticDiff,
    type SemanticDiffEntry,
} from './types.js';

interface CategoryBucket {
    spans: DiffSpan[];
    tokens: number;
}

export class SemanticDiffEngine implements SemanticAnalyzer {
    constructor(private readonly rules: readonly ClassificationRule[] = CLASSIFICATION_RULES) {}

    /**
     * Categorize the change from `before` to `after`.
     *
     * @returns Empty diff when the blobs are equal
     */
    categorize(before: string, after: string): SemanticDiff {
        if (before === after) return EMPTY_SEMANTIC_DIFF;

        const spans: DiffSpan[] = spans_compute(before, after);
        if (spans.length === 0) return EMPTY_SEMANTIC_DIFF;

        const buckets: Map<SemanticCategory, CategoryBucket> = new Map();
        let tokensChanged: number = 0;

        for (const span of spans) {
            const category: SemanticCategory = span_classify(span, this.rules);
            const tokens: number = spanTokens_count(span);
            const bucket: CategoryBucket = buckets.get(category) ?? { spans: [], tokens: 0 };
            bucket.spans.push(span);
            bucket.tokens += tokens;
            buckets.set(category, bucket);
            tokensChanged += tokens;
        }

        const entries: SemanticDiffEntry[] = [];
        for (const category of SEMANTIC_CATEGORIES) {
            const bucket: CategoryBucket | undefined = buckets.get(category);
            if (!bucket) continue;
            entries.push(entry_build(category, bucket, tokensChanged));
        }

        return { entries, tokensChanged };
    }
}

function entry_build(category: SemanticCategory, bucket: CategoryBucket, tokensChanged: number): SemanticDiffEntry {
    let linesAdded: number = 0;
    let linesRemoved: number = 0;
    for (const span of bucket.spans) {
        linesAdded += span.added.length;
        linesRemoved += span.removed.length;
    }
    return {
        category,
        description: description_build(category, linesAdded, linesRemoved),
        magnitude: magnitude_round(bucket.tokens / tokensChanged),
        linesAdded,
        linesRemoved,
        spans: bucket.spans,
    };
}

function description_build(category: SemanticCategory, added: number, removed: number): string {
    if (removed === 0) return `Added ${category} (${lines_label(added)})`;
    if (added === 0) return `Removed ${category} (${lines_label(removed)})`;
    return `Modified ${category} (+${added} -${removed} lines)`;
}

function lines_label(count: number): string {
    return count === 1 ? '1 line' : `${count} lines`;
}

/** Four decimal places keep magnitudes stable across platforms. */
function magnitude_round(value: number): number {
    return Math.round(value * 10000) / 10000;
}

/**
 * A diff is significant when any category reaches `threshold`, or when it
 * touches constraints or template variables at all.
 */
export function semanticDiff_isSignificant(diff: SemanticDiff, threshold: number = 0.1): boolean {
    return diff.entries.some((entry: SemanticDiffEntry): boolean =>
        entry.magnitude >= threshold || entry.category === 'constraints' || entry.category === 'variables',
    );
}
