/**
 * @file Bisect Report Renderer
 *
 * @module bisect/render
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { semanticDiff_render } from '../diff/render.js';
import type { BisectJudgment, BisectReport } from './types.js';

export function bisectReport_render(report: BisectReport, options: { color?: boolean } = {}): string {
    const paint: ChalkInstance = new Chalk({ level: options.color ? 1 : 0 });
    const out: string[] = [
        paint.bold(`First bad version of ${report.artifact}: ${report.firstBad.sequence}`),
        `  message: ${report.firstBad.message}`,
        `  author:  ${report.firstBad.author}`,
        `Last good version: ${report.lastGood.sequence}`,
    ];
    if (report.failingInput) {
        out.push(`Failing input: ${report.failingInput}`);
    }

    out.push('', `Judgments (${report.judgments.length}):`);
    for (const judgment of report.judgments) {
        out.push(judgment_render(judgment, paint));
    }

    out.push('', `Changes ${report.lastGood.sequence} → ${report.firstBad.sequence}:`);
    out.push(semanticDiff_render(report.diff, { color: options.color, lines: false }));
    return out.join('\n');
}

function judgment_render(judgment: BisectJudgment, paint: ChalkInstance): string {
    const verdict: string = judgment.verdict === 'good' ? paint.green('good') : paint.red('bad');
    return `  v${judgment.sequence}: ${verdict}`;
}
