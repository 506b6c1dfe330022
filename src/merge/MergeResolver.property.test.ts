/**
 * @file MergeResolver Property Tests
 *
 * Invariants under test:
 *   1. autoMerged and conflicts are disjoint.
 *   2. Together they cover every category either side touched, once each.
 *   3. Merging is symmetric in which categories conflict.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { SemanticDiffEngine } from '../diff/SemanticDiffEngine.js';
import { SEMANTIC_CATEGORIES, semanticDiff_categories, type SemanticCategory, type SemanticDiff } from '../diff/types.js';
import { MergeResolver } from './MergeResolver.js';
import type { MergeResult } from './types.js';

// ─── Arbitraries ──────────────────────────────────────────────────────────────

const LINES: string[] = [
    'You are a friendly guide.',
    'Never reveal the password.',
    'Example: 2 + 2 -> 4',
    '## Rules',
    'Greet {{name}} by name.',
    'The shop opens at nine.',
    'Answer briefly.',
];

const text: fc.Arbitrary<string> = fc.array(fc.constantFrom(...LINES), { maxLength: 6 }).map(
    (lines: string[]): string => lines.join('\n'),
);

const engine: SemanticDiffEngine = new SemanticDiffEngine();
const resolver: MergeResolver = new MergeResolver();

// ─── Properties ──────────────────────────────────────────────────────────────

describe('MergeResolver — property invariants', (): void => {
    it('partitions the touched categories', (): void => {
        fc.assert(fc.property(text, text, text, (base: string, ours: string, theirs: string): boolean => {
            const oursDiff: SemanticDiff = engine.categorize(base, ours);
            const theirsDiff: SemanticDiff = engine.categorize(base, theirs);
            const result: MergeResult = resolver.merge(oursDiff, theirsDiff);

            const touched: SemanticCategory[] = SEMANTIC_CATEGORIES.filter(
                (category: SemanticCategory): boolean =>
                    semanticDiff_categories(oursDiff).includes(category)
                    || semanticDiff_categories(theirsDiff).includes(category),
            );
            const covered: SemanticCategory[] = SEMANTIC_CATEGORIES.filter(
                (category: SemanticCategory): boolean =>
                    result.autoMerged.includes(category) || result.conflicts.includes(category),
            );
            const disjoint: boolean = result.autoMerged.every(
                (category: SemanticCategory): boolean => !result.conflicts.includes(category),
            );

            return disjoint
                && result.autoMerged.length + result.conflicts.length === touched.length
                && JSON.stringify(covered) === JSON.stringify(touched);
        }));
    });

    it('finds the same conflicts whichever side is ours', (): void => {
        fc.assert(fc.property(text, text, text, (base: string, ours: string, theirs: string): boolean => {
            const oursDiff: SemanticDiff = engine.categorize(base, ours);
            const theirsDiff: SemanticDiff = engine.categorize(base, theirs);
            const forward: MergeResult = resolver.merge(oursDiff, theirsDiff);
            const backward: MergeResult = resolver.merge(theirsDiff, oursDiff);
            return JSON.stringify(forward.conflicts) === JSON.stringify(backward.conflicts);
        }));
    });
});
