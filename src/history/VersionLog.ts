/**
 * @file Version Log
 *
 * Lazy, restartable sequence of an artifact's versions in ascending order,
 * optionally filtered by a compiled query. Every iteration starts from a
 * fresh snapshot of the history; a caller that stops pulling stops all
 * further work. Blob content and per-version diffs are loaded only for
 * queries that read the `content` or `changes` fields.
 *
 * @module history/VersionLog
 */

import type { SemanticAnalyzer, SemanticDiff } from '../diff/types.js';
import type { CompiledQuery, QueryDiagnostics, QueryTarget } from '../query/types.js';
import type { Version } from './types.js';

export interface VersionLogSource {
    /** Current versions, ascending. The returned array is not mutated later. */
    snapshot(): Promise<readonly Version[]>;
    content_load(version: Version): Promise<string>;
}

export class VersionLog implements AsyncIterable<Version> {
    constructor(
        private readonly source: VersionLogSource,
        private readonly analyzer: SemanticAnalyzer,
        readonly query: CompiledQuery | null = null,
        private readonly diagnostics?: QueryDiagnostics,
    ) {}

    async *[Symbol.asyncIterator](): AsyncGenerator<Version, void, undefined> {
        const versions: readonly Version[] = await this.source.snapshot();
        const query: CompiledQuery | null = this.query;
        if (query === null) {
            yield* versions;
            return;
        }

        const needsChanges: boolean = query.usesChanges();
        const needsContent: boolean = needsChanges || query.usesContent();
        let previousContent: string = '';

        for (const version of versions) {
            const target: QueryTarget = { version };
            if (needsContent) {
                const content: string = await this.source.content_load(version);
                target.content = content;
                if (needsChanges) {
                    const changes: SemanticDiff = this.analyzer.categorize(previousContent, content);
                    target.changes = changes;
                }
                previousContent = content;
            }
            if (query.matches(target, this.diagnostics)) {
                yield version;
            }
        }
    }

    /**
     * Drain the sequence into an array.
     *
     * @param limit - Stop after this many matches
     */
    async collect(limit: number = Infinity): Promise<Version[]> {
        const out: Version[] = [];
        if (limit <= 0) return out;
        for await (const version of this) {
            out.push(version);
            if (out.length >= limit) break;
        }
        return out;
    }
}
