/**
 * @file Line Alignment
 *
 * Line-level alignment of two blobs into insert/delete/replace spans.
 * Lines are encoded as single UTF-16 units and aligned with diff-match-patch
 * (Myers' O(ND) shortest edit script, i.e. a longest common subsequence of
 * lines). The diff deadline is disabled so the result depends only on the
 * input pair.
 *
 * @module diff/alignment
 */

import DiffMatchPatch from 'diff-match-patch';
import type { DiffSpan } from './types.js';

const DIFF_DELETE: number = -1;
const DIFF_INSERT: number = 1;

/**
 * Split a blob into lines. A single trailing newline does not create an
 * extra empty line; the empty blob has no lines.
 */
export function lines_split(text: string): string[] {
    if (text === '') return [];
    const lines: string[] = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

// One UTF-16 unit per line. Lines present on one side only can never
// match, so each side's one-sided lines share a single sentinel unit.
const BEFORE_ONLY: number = 0;
const AFTER_ONLY: number = 1;
const FIRST_SHARED: number = 2;
const LAST_UNIT: number = 0xffff;

interface LineEncoding {
    before: string;
    after: string;
}

/**
 * Encode both line lists as unit strings for diff-match-patch. Every
 * distinct line present on both sides gets its own unit. Past the 65,534
 * units available, further shared lines are encoded as one-sided, which
 * keeps every span correct but may report a larger edit than the minimum.
 */
function lines_encode(before: readonly string[], after: readonly string[]): LineEncoding {
    const inAfter: Set<string> = new Set(after);
    const codes: Map<string, number> = new Map();
    let next: number = FIRST_SHARED;

    const beforeUnits: string[] = before.map((line: string): string => {
        if (!inAfter.has(line)) return String.fromCharCode(BEFORE_ONLY);
        let code: number | undefined = codes.get(line);
        if (code === undefined && next <= LAST_UNIT) {
            code = next++;
            codes.set(line, code);
        }
        return String.fromCharCode(code ?? BEFORE_ONLY);
    });
    const afterUnits: string[] = after.map((line: string): string =>
        String.fromCharCode(codes.get(line) ?? AFTER_ONLY),
    );
    return { before: beforeUnits.join(''), after: afterUnits.join('') };
}

/** Length of the shared run at the start (or, with `fromEnd`, the end) of both lists. */
function commonRun_count(before: readonly string[], after: readonly string[], fromEnd: boolean, limit: number): number {
    let count: number = 0;
    while (count < limit) {
        const a: string = fromEnd ? before[before.length - 1 - count] : before[count];
        const b: string = fromEnd ? after[after.length - 1 - count] : after[count];
        if (a !== b) break;
        count++;
    }
    return count;
}

/**
 * Compute the changed spans between two blobs, in document order.
 * Returns an empty list when the blobs have identical lines.
 */
export function spans_compute(before: string, after: string): DiffSpan[] {
    const oldLines: string[] = lines_split(before);
    const newLines: string[] = lines_split(after);

    const shorter: number = Math.min(oldLines.length, newLines.length);
    const prefix: number = commonRun_count(oldLines, newLines, false, shorter);
    const suffix: number = commonRun_count(oldLines, newLines, true, shorter - prefix);
    const oldMiddle: string[] = oldLines.slice(prefix, oldLines.length - suffix);
    const newMiddle: string[] = newLines.slice(prefix, newLines.length - suffix);

    const dmp = new DiffMatchPatch();
    dmp.Diff_Timeout = 0;
    const encoded: LineEncoding = lines_encode(oldMiddle, newMiddle);
    const diffs = dmp.diff_main(encoded.before, encoded.after, false);

    const spans: DiffSpan[] = [];
    // Positions within the middles; lines are decoded by position, never by unit.
    let oldLine: number = 0;
    let newLine: number = 0;
    let removed: string[] = [];
    let added: string[] = [];
    let oldStart: number = 0;
    let newStart: number = 0;

    const span_flush = (): void => {
        if (removed.length === 0 && added.length === 0) return;
        spans.push({
            kind: removed.length === 0 ? 'insert' : added.length === 0 ? 'delete' : 'replace',
            removed,
            added,
            oldStart: prefix + oldStart,
            newStart: prefix + newStart,
        });
        removed = [];
        added = [];
    };

    for (const [operation, units] of diffs) {
        const count: number = units.length;
        if (operation === DIFF_DELETE || operation === DIFF_INSERT) {
            if (removed.length === 0 && added.length === 0) {
                oldStart = oldLine;
                newStart = newLine;
            }
            if (operation === DIFF_DELETE) {
                for (let i = 0; i < count; i++) removed.push(oldMiddle[oldLine + i]);
                oldLine += count;
            } else {
                for (let i = 0; i < count; i++) added.push(newMiddle[newLine + i]);
                newLine += count;
            }
            continue;
        }
        span_flush();
        oldLine += count;
        newLine += count;
    }
    span_flush();

    return spans;
}

/** Whitespace-separated words on a line, with every line worth at least one token. */
export function tokens_count(line: string): number {
    const words: string[] = line.trim().split(/\s+/).filter((word: string): boolean => word.length > 0);
    return Math.max(1, words.length);
}

export function spanTokens_count(span: DiffSpan): number {
    let total: number = 0;
    for (const line of span.removed) total += tokens_count(line);
    for (const line of span.added) total += tokens_count(line);
    return total;
}
