/**
 * @file Merge Resolver
 *
 * Decides, per semantic category, whether two diffs taken from the same
 * ancestor can be combined without review:
 *
 *   touched by one side only            auto
 *   touched by both, both pure adds     auto, added lines concatenated
 *   anything else touched by both       conflict
 *
 * Works only on SemanticDiff values, so any SemanticAnalyzer can feed it.
 *
 * @module merge/MergeResolver
 */

import {
    SEMANTIC_CATEGORIES,
    semanticDiff_entry,
    type DiffSpan,
    type SemanticAnalyzer,
    type SemanticCategory,
    type SemanticDiff,
    type SemanticDiffEntry,
} from '../diff/types.js';
import type { CategoryResolution, MergeAnalysis, MergeResult } from './types.js';

export class MergeResolver {
    merge(ours: SemanticDiff, theirs: SemanticDiff): MergeResult {
        const resolutions: CategoryResolution[] = [];

        for (const category of SEMANTIC_CATEGORIES) {
            const mine: SemanticDiffEntry | null = semanticDiff_entry(ours, category);
            const other: SemanticDiffEntry | null = semanticDiff_entry(theirs, category);
            if (mine && other) {
                resolutions.push(category_resolveBoth(category, mine, other));
            } else if (mine) {
                resolutions.push(category_resolveOne(category, 'ours', mine));
            } else if (other) {
                resolutions.push(category_resolveOne(category, 'theirs', other));
            }
        }

        return {
            autoMerged: resolutions.filter((r: CategoryResolution): boolean => r.status === 'auto').map(resolution_category),
            conflicts: resolutions.filter((r: CategoryResolution): boolean => r.status === 'conflict').map(resolution_category),
            resolutions,
        };
    }
}

function resolution_category(resolution: CategoryResolution): SemanticCategory {
    return resolution.category;
}

function category_resolveOne(
    category: SemanticCategory,
    source: 'ours' | 'theirs',
    entry: SemanticDiffEntry,
): CategoryResolution {
    const resolution: CategoryResolution = {
        category,
        status: 'auto',
        source,
        reason: `only ${source} changed ${category}`,
    };
    if (entry_isPureAddition(entry)) {
        resolution.additions = entryAdditions_collect(entry);
    }
    return resolution;
}

function category_resolveBoth(
    category: SemanticCategory,
    ours: SemanticDiffEntry,
    theirs: SemanticDiffEntry,
): CategoryResolution {
    const oursAdds: boolean = entry_isPureAddition(ours);
    const theirsAdds: boolean = entry_isPureAddition(theirs);

    if (oursAdds && theirsAdds) {
        return {
            category,
            status: 'auto',
            source: 'both',
            reason: `both sides only added ${category}`,
            additions: [...entryAdditions_collect(ours), ...entryAdditions_collect(theirs)],
        };
    }

    const reason: string = oursAdds !== theirsAdds
        ? `one side added ${category} while the other removed or rewrote it`
        : `both sides removed or rewrote ${category}`;
    return {
        category,
        status: 'conflict',
        source: 'both',
        reason,
        hint: `Review ${category} changes and merge manually`,
    };
}

function entry_isPureAddition(entry: SemanticDiffEntry): boolean {
    return entry.spans.every((span: DiffSpan): boolean => span.removed.length === 0);
}

function entryAdditions_collect(entry: SemanticDiffEntry): string[] {
    return entry.spans.flatMap((span: DiffSpan): readonly string[] => span.added);
}

/**
 * Diff `ours` and `theirs` against their common ancestor and resolve.
 */
export function merge_analyze(
    analyzer: SemanticAnalyzer,
    base: string,
    ours: string,
    theirs: string,
    resolver: MergeResolver = new MergeResolver(),
): MergeAnalysis {
    const oursDiff: SemanticDiff = analyzer.categorize(base, ours);
    const theirsDiff: SemanticDiff = analyzer.categorize(base, theirs);
    return { ...resolver.merge(oursDiff, theirsDiff), ours: oursDiff, theirs: theirsDiff };
}
