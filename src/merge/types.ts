/**
 * @file Merge Type Definitions
 *
 * @module merge
 */

import type { SemanticCategory, SemanticDiff } from '../diff/types.js';

export type ResolutionStatus = 'auto' | 'conflict';

/** Which side(s) touched the category. */
export type ResolutionSource = 'ours' | 'theirs' | 'both';

/**
 * Outcome for one category.
 *
 * @property additions - Lines to take when auto-merging: ours first, then theirs
 * @property hint - Guidance for resolving a conflict by hand
 */
export interface CategoryResolution {
    category: SemanticCategory;
    status: ResolutionStatus;
    source: ResolutionSource;
    reason: string;
    additions?: readonly string[];
    hint?: string;
}

/**
 * `autoMerged` and `conflicts` are disjoint and together hold every
 * category either diff touched, each once, in category order.
 */
export interface MergeResult {
    autoMerged: readonly SemanticCategory[];
    conflicts: readonly SemanticCategory[];
    resolutions: readonly CategoryResolution[];
}

export interface MergeAnalysis extends MergeResult {
    ours: SemanticDiff;
    theirs: SemanticDiff;
}
