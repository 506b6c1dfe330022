/**
 * @file Merge Resolver Tests
 *
 * @module merge
 */

import { describe, it, expect } from 'vitest';
import { SemanticDiffEngine } from '../diff/SemanticDiffEngine.js';
import { EMPTY_SEMANTIC_DIFF, type DiffSpan, type SemanticCategory, type SemanticDiff } from '../diff/types.js';
import { MergeResolver, merge_analyze } from './MergeResolver.js';
import type { MergeAnalysis, MergeResult } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

function span_make(removed: string[], added: string[]): DiffSpan {
    return {
        kind: removed.length === 0 ? 'insert' : added.length === 0 ? 'delete' : 'replace',
        removed,
        added,
        oldStart: 0,
        newStart: 0,
    };
}

function diff_make(...parts: Array<[SemanticCategory, DiffSpan[]]>): SemanticDiff {
    return {
        entries: parts.map(([category, spans]: [SemanticCategory, DiffSpan[]]) => ({
            category,
            description: category,
            magnitude: 1 / parts.length,
            linesAdded: spans.reduce((n: number, span: DiffSpan): number => n + span.added.length, 0),
            linesRemoved: spans.reduce((n: number, span: DiffSpan): number => n + span.removed.length, 0),
            spans,
        })),
        tokensChanged: 1,
    };
}

const BASE: string = 'You are a helpful assistant.\nAnswer questions.';

// ═══════════════════════════════════════════════════════════════════
// MergeResolver
// ═══════════════════════════════════════════════════════════════════

describe('merge/MergeResolver', (): void => {
    const resolver: MergeResolver = new MergeResolver();

    it('returns nothing for two empty diffs', (): void => {
        expect(resolver.merge(EMPTY_SEMANTIC_DIFF, EMPTY_SEMANTIC_DIFF)).toEqual({
            autoMerged: [],
            conflicts: [],
            resolutions: [],
        });
    });

    it('auto-merges categories only one side touched', (): void => {
        const ours: SemanticDiff = diff_make(['tone', [span_make(['Be formal.'], ['Be friendly.'])]]);
        const theirs: SemanticDiff = diff_make(['examples', [span_make([], ['Input: hi', 'Output: hello'])]]);
        const result: MergeResult = resolver.merge(ours, theirs);

        expect(result.autoMerged).toEqual(['tone', 'examples']);
        expect(result.conflicts).toEqual([]);
        expect(result.resolutions).toEqual([
            { category: 'tone', status: 'auto', source: 'ours', reason: 'only ours changed tone' },
            {
                category: 'examples',
                status: 'auto',
                source: 'theirs',
                reason: 'only theirs changed examples',
                additions: ['Input: hi', 'Output: hello'],
            },
        ]);
    });

    it('combines additions when both sides only added to a category', (): void => {
        const ours: SemanticDiff = diff_make(['constraints', [span_make([], ['Never guess.'])]]);
        const theirs: SemanticDiff = diff_make(['constraints', [span_make([], ['Always cite.'])]]);
        const result: MergeResult = resolver.merge(ours, theirs);

        expect(result.autoMerged).toEqual(['constraints']);
        expect(result.resolutions[0]).toEqual({
            category: 'constraints',
            status: 'auto',
            source: 'both',
            reason: 'both sides only added constraints',
            additions: ['Never guess.', 'Always cite.'],
        });
    });

    it('conflicts when both sides rewrite a category', (): void => {
        const ours: SemanticDiff = diff_make(['tone', [span_make(['Be calm.'], ['Be warm.'])]]);
        const theirs: SemanticDiff = diff_make(['tone', [span_make(['Be calm.'], [])]]);
        const result: MergeResult = resolver.merge(ours, theirs);

        expect(result.conflicts).toEqual(['tone']);
        expect(result.resolutions[0]).toEqual({
            category: 'tone',
            status: 'conflict',
            source: 'both',
            reason: 'both sides removed or rewrote tone',
            hint: 'Review tone changes and merge manually',
        });
    });

    it('conflicts when one side adds and the other rewrites', (): void => {
        const ours: SemanticDiff = diff_make(['context', [span_make([], ['Users are nurses.'])]]);
        const theirs: SemanticDiff = diff_make(['context', [span_make(['Old note.'], ['New note.'])]]);
        expect(resolver.merge(ours, theirs).resolutions[0].reason).toBe(
            'one side added context while the other removed or rewrote it',
        );
    });

    it('lists categories in fixed order regardless of input order', (): void => {
        const ours: SemanticDiff = diff_make(
            ['context', [span_make([], ['a'])]],
            ['tone', [span_make(['b'], ['c'])]],
        );
        const theirs: SemanticDiff = diff_make(['structure', [span_make([], ['# d'])]]);
        expect(resolver.merge(ours, theirs).autoMerged).toEqual(['tone', 'structure', 'context']);
    });
});

// ═══════════════════════════════════════════════════════════════════
// merge_analyze
// ═══════════════════════════════════════════════════════════════════

describe('merge/merge_analyze', (): void => {
    const engine: SemanticDiffEngine = new SemanticDiffEngine();

    it('merges independent additions from a common ancestor', (): void => {
        const analysis: MergeAnalysis = merge_analyze(
            engine,
            BASE,
            `${BASE}\nNever share secrets.`,
            `${BASE}\nThe user works in finance.`,
        );

        expect(analysis.autoMerged).toEqual(['constraints', 'context']);
        expect(analysis.conflicts).toEqual([]);
        expect(analysis.resolutions.map((r) => r.additions)).toEqual([
            ['Never share secrets.'],
            ['The user works in finance.'],
        ]);
        expect(analysis.ours.entries.map((entry) => entry.category)).toEqual(['constraints']);
    });

    it('reports a conflict when both sides rewrite the same line', (): void => {
        const analysis: MergeAnalysis = merge_analyze(
            engine,
            BASE,
            'You are a formal assistant.\nAnswer questions.',
            'You are a playful assistant.\nAnswer questions.',
        );
        expect(analysis.conflicts).toEqual(['tone']);
        expect(analysis.autoMerged).toEqual([]);
    });

    it('treats an unchanged side as contributing nothing', (): void => {
        const analysis: MergeAnalysis = merge_analyze(engine, BASE, BASE, `${BASE}\nNever share secrets.`);
        expect(analysis.resolutions).toEqual([
            {
                category: 'constraints',
                status: 'auto',
                source: 'theirs',
                reason: 'only theirs changed constraints',
                additions: ['Never share secrets.'],
            },
        ]);
    });
});
