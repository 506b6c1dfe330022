/**
 * @file Semantic Diff Renderer
 *
 * Plain-text rendering of a SemanticDiff for terminals and reports. Colour
 * comes from chalk and is off unless requested.
 *
 * @module diff/render
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { SemanticDiff, SemanticDiffEntry } from './types.js';

export interface RenderOptions {
    color?: boolean;
    /** Include the changed lines under each category. Default true. */
    lines?: boolean;
}

const BAR_WIDTH: number = 10;

export function semanticDiff_render(diff: SemanticDiff, options: RenderOptions = {}): string {
    const paint: ChalkInstance = new Chalk({ level: options.color ? 1 : 0 });
    const showLines: boolean = options.lines ?? true;

    if (diff.entries.length === 0) {
        return 'No semantic changes.';
    }

    const out: string[] = [];
    for (const entry of diff.entries) {
        out.push(entryHeader_render(entry, paint));
        if (!showLines) continue;
        for (const span of entry.spans) {
            for (const line of span.removed) out.push(paint.red(`  - ${line}`));
            for (const line of span.added) out.push(paint.green(`  + ${line}`));
        }
    }
    return out.join('\n');
}

function entryHeader_render(entry: SemanticDiffEntry, paint: ChalkInstance): string {
    const filled: number = Math.round(entry.magnitude * BAR_WIDTH);
    const bar: string = '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
    const percent: string = `${Math.round(entry.magnitude * 100)}%`.padStart(4);
    return `${paint.bold(entry.category.padEnd(12))} ${paint.cyan(bar)} ${percent}  ${entry.description}`;
}
