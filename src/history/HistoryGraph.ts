/**
 * @file History Graph
 *
 * Per-artifact append-only sequence of versions with a movable HEAD,
 * persisted through a StorageBackend:
 *
 *   artifacts/<name>/versions/<seq>.json   one record per version
 *   artifacts/<name>/HEAD.json             { sequence }
 *
 * Mutations on one artifact (commit, checkout, tag, metric_record) run one
 * at a time under a per-artifact lock; different artifacts proceed in
 * parallel. The in-memory index is only updated after every write of a
 * mutation has succeeded, so readers never observe a half-applied change
 * and a failed mutation leaves the artifact as it was.
 *
 * @module history/HistoryGraph
 */

import { ArtifactNotFoundError, IntegrityViolationError, VersionNotFoundError, type QueryTypeError } from '../core/errors.js';
import type { HistoryBus, HistoryEvent } from '../core/events.js';
import { KeyedLock } from '../core/lock.js';
import { Logger } from '../core/log.js';
import { input_validate, record_decode } from '../core/validation.js';
import { SemanticDiffEngine } from '../diff/SemanticDiffEngine.js';
import type { SemanticAnalyzer, SemanticDiff } from '../diff/types.js';
import { query_compile } from '../query/QueryEngine.js';
import type { CompiledQuery, QueryDiagnostics } from '../query/types.js';
import type { ContentStore } from '../store/ContentStore.js';
import type { StorageBackend } from '../store/types.js';
import {
    ArtifactNameSchema,
    HeadRecordSchema,
    MetricNameSchema,
    MetricValueSchema,
    SequenceSchema,
    TagLabelSchema,
    VersionRecordSchema,
    type HeadRecord,
    type VersionRecord,
} from './schemas.js';
import type { Clock, VariableExtractor, Version } from './types.js';
import { variables_extract } from './variables.js';
import { VersionLog } from './VersionLog.js';

export interface HistoryGraphOptions {
    analyzer?: SemanticAnalyzer;
    bus?: HistoryBus;
    logger?: Logger;
    clock?: Clock;
    extractor?: VariableExtractor;
}

export interface LogOptions {
    /** Receives comparisons that evaluated false because of a type error. */
    diagnostics?: QueryDiagnostics;
}

interface ArtifactIndex {
    versions: Version[];
    head: number;
}

const ARTIFACTS_ROOT: string = 'artifacts';
const SEQUENCE_WIDTH: number = 8;
const RECORD_FILE: RegExp = /^(\d+)\.json$/;

export class HistoryGraph {
    private readonly analyzer: SemanticAnalyzer;
    private readonly bus: HistoryBus | null;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly extractor: VariableExtractor;

    private readonly locks: KeyedLock = new KeyedLock();
    private readonly indexes: Map<string, ArtifactIndex> = new Map();
    private readonly loading: Map<string, Promise<ArtifactIndex>> = new Map();
    /** Fingerprints of commits that have stored their blob but not yet their record. */
    private readonly inFlight: Map<string, number> = new Map();

    constructor(
        private readonly content: ContentStore,
        private readonly backend: StorageBackend,
        options: HistoryGraphOptions = {},
    ) {
        this.analyzer = options.analyzer ?? new SemanticDiffEngine();
        this.bus = options.bus ?? null;
        this.logger = options.logger ?? new Logger('history', 'warn');
        this.clock = options.clock ?? ((): Date => new Date());
        this.extractor = options.extractor ?? variables_extract;
        this.content.referenceChecker_set((fingerprint: string): Promise<boolean> => this.fingerprint_isReferenced(fingerprint));
    }

    // ─── Mutations ──────────────────────────────────────────────

    /**
     * Append a version holding `content` and move HEAD to it. Resolves only
     * after the blob, the version record and HEAD are durable.
     */
    async commit(artifact: string, content: string, message: string, author: string): Promise<Version> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const fingerprint: string = this.content.fingerprint_compute(content);

        return this.locks.run(artifact, async (): Promise<Version> => {
            const index: ArtifactIndex = await this.index_load(artifact);
            const sequence: number = index.versions.length + 1;

            this.inFlight_add(fingerprint);
            try {
                await this.content.put(content);

                const record: VersionRecord = {
                    artifact,
                    sequence,
                    fingerprint,
                    variables: this.variables_derive(artifact, content),
                    author,
                    message,
                    createdAt: this.clock().toISOString(),
                    tags: [],
                    metrics: {},
                };
                const recordPath: string = versionPath_resolve(artifact, sequence);
                await this.backend.object_write(recordPath, JSON.stringify(record));
                try {
                    await this.head_write(artifact, sequence);
                } catch (error: unknown) {
                    await this.record_rollback(recordPath, error);
                    throw error;
                }

                const version: Version = version_freeze(record);
                index.versions.push(version);
                index.head = sequence;
                this.event_emit({ type: 'commit', artifact, sequence, fingerprint });
                return version;
            } finally {
                this.inFlight_remove(fingerprint);
            }
        });
    }

    /**
     * Move HEAD to an existing version. History is untouched.
     *
     * @throws {VersionNotFoundError} If `sequence` is outside `1..N`
     */
    async checkout(artifact: string, sequence: number): Promise<Version> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        return this.locks.run(artifact, async (): Promise<Version> => {
            const index: ArtifactIndex = await this.index_require(artifact);
            const version: Version = version_lookup(artifact, index, sequence);
            await this.head_write(artifact, sequence);
            index.head = sequence;
            this.event_emit({ type: 'checkout', artifact, sequence });
            return version;
        });
    }

    /** Add `label` to a version's tags. Tagging twice with the same label is a no-op. */
    async tag(artifact: string, sequence: number, label: string): Promise<Version> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        input_validate(TagLabelSchema, label, 'tag label');
        return this.locks.run(artifact, async (): Promise<Version> => {
            const index: ArtifactIndex = await this.index_require(artifact);
            const version: Version = version_lookup(artifact, index, sequence);
            if (version.tags.includes(label)) return version;

            const updated: Version = await this.version_replace(index, version, {
                tags: [...version.tags, label],
            });
            this.event_emit({ type: 'tag', artifact, sequence, label });
            return updated;
        });
    }

    /**
     * Record a metric from an external test run. Last write wins per metric
     * name; the sequence must exist.
     */
    async metric_record(artifact: string, sequence: number, name: string, value: number): Promise<Version> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        input_validate(MetricNameSchema, name, 'metric name');
        input_validate(MetricValueSchema, value, 'metric value');
        return this.locks.run(artifact, async (): Promise<Version> => {
            const index: ArtifactIndex = await this.index_require(artifact);
            const version: Version = version_lookup(artifact, index, sequence);
            const updated: Version = await this.version_replace(index, version, {
                metrics: { ...version.metrics, [name]: value },
            });
            this.event_emit({ type: 'metric', artifact, sequence, name, value });
            return updated;
        });
    }

    // ─── Reads ──────────────────────────────────────────────────

    async version_get(artifact: string, sequence: number): Promise<Version> {
        const index: ArtifactIndex = await this.index_require(artifact);
        return version_lookup(artifact, index, sequence);
    }

    /** The version HEAD points at. */
    async head_get(artifact: string): Promise<Version> {
        const index: ArtifactIndex = await this.index_require(artifact);
        return version_lookup(artifact, index, index.head);
    }

    async content_get(artifact: string, sequence: number): Promise<string> {
        const version: Version = await this.version_get(artifact, sequence);
        return this.content.get(version.fingerprint);
    }

    /** Number of versions; 0 for an artifact with no history. */
    async versions_count(artifact: string): Promise<number> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const index: ArtifactIndex = await this.index_load(artifact);
        return index.versions.length;
    }

    /** Names of all artifacts with at least one version, sorted. */
    async artifacts_list(): Promise<string[]> {
        const names: string[] = [];
        for (const name of await this.backend.children_list(ARTIFACTS_ROOT)) {
            if (!ArtifactNameSchema.safeParse(name).success) continue;
            if ((await this.versions_count(name)) > 0) names.push(name);
        }
        return names.sort();
    }

    /**
     * Versions in ascending sequence order, optionally filtered. A string
     * filter is compiled immediately, so syntax errors throw here rather
     * than on first pull.
     *
     * @throws {QuerySyntaxError} If `filter` does not parse
     */
    log(artifact: string, filter?: string | CompiledQuery, options: LogOptions = {}): VersionLog {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const query: CompiledQuery | null = filter === undefined
            ? null
            : typeof filter === 'string' ? query_compile(filter) : filter;

        const diagnostics: QueryDiagnostics = (error: QueryTypeError): void => {
            this.logger.debug('query comparison degraded to false', { artifact, reason: error.message });
            options.diagnostics?.(error);
        };

        return new VersionLog(
            {
                snapshot: async (): Promise<readonly Version[]> => {
                    const index: ArtifactIndex = await this.index_require(artifact);
                    return index.versions.slice();
                },
                content_load: (version: Version): Promise<string> => this.content.get(version.fingerprint),
            },
            this.analyzer,
            query,
            diagnostics,
        );
    }

    /**
     * Semantic diff from version `a` to version `b`.
     *
     * @throws {VersionNotFoundError} If either sequence is absent
     */
    async diff(artifact: string, a: number, b: number): Promise<SemanticDiff> {
        const index: ArtifactIndex = await this.index_require(artifact);
        const before: Version = version_lookup(artifact, index, a);
        const after: Version = version_lookup(artifact, index, b);
        if (before.fingerprint === after.fingerprint) {
            const text: string = await this.content.get(before.fingerprint);
            return this.analyzer.categorize(text, text);
        }
        const [beforeText, afterText] = await Promise.all([
            this.content.get(before.fingerprint),
            this.content.get(after.fingerprint),
        ]);
        return this.analyzer.categorize(beforeText, afterText);
    }

    /** Whether any committed or in-flight version points at `fingerprint`. */
    async fingerprint_isReferenced(fingerprint: string): Promise<boolean> {
        if (this.inFlight.has(fingerprint)) return true;
        for (const artifact of await this.artifacts_list()) {
            const index: ArtifactIndex = await this.index_load(artifact);
            if (index.versions.some((version: Version): boolean => version.fingerprint === fingerprint)) {
                return true;
            }
        }
        return false;
    }

    // ─── Index ──────────────────────────────────────────────────

    private async index_require(artifact: string): Promise<ArtifactIndex> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const index: ArtifactIndex = await this.index_load(artifact);
        if (index.versions.length === 0) {
            throw new ArtifactNotFoundError(artifact);
        }
        return index;
    }

    /** Load an artifact's index once; concurrent callers share the same load. */
    private index_load(artifact: string): Promise<ArtifactIndex> {
        const cached: ArtifactIndex | undefined = this.indexes.get(artifact);
        if (cached) return Promise.resolve(cached);

        let pending: Promise<ArtifactIndex> | undefined = this.loading.get(artifact);
        if (!pending) {
            pending = this.index_read(artifact)
                .then((index: ArtifactIndex): ArtifactIndex => {
                    this.indexes.set(artifact, index);
                    return index;
                })
                .finally((): void => {
                    this.loading.delete(artifact);
                });
            this.loading.set(artifact, pending);
        }
        return pending;
    }

    private async index_read(artifact: string): Promise<ArtifactIndex> {
        const sequences: number[] = [];
        for (const name of await this.backend.children_list(`${ARTIFACTS_ROOT}/${artifact}/versions`)) {
            const match: RegExpExecArray | null = RECORD_FILE.exec(name);
            if (match) sequences.push(Number(match[1]));
        }
        sequences.sort((a: number, b: number): number => a - b);

        const versions: Version[] = [];
        for (let i = 0; i < sequences.length; i++) {
            const expected: number = i + 1;
            if (sequences[i] !== expected) {
                throw new IntegrityViolationError(
                    `History of '${artifact}' has a gap: expected version ${expected}, found ${sequences[i]}`,
                );
            }
            const path: string = versionPath_resolve(artifact, expected);
            const raw: string | null = await this.backend.object_read(path);
            if (raw === null) {
                throw new IntegrityViolationError(`Version record ${path} vanished while loading`);
            }
            const record: VersionRecord = record_decode(VersionRecordSchema, raw, path);
            if (record.sequence !== expected || record.artifact !== artifact) {
                throw new IntegrityViolationError(`Version record ${path} describes ${record.artifact}@${record.sequence}`);
            }
            versions.push(version_freeze(record));
        }

        const head: number = await this.head_read(artifact, versions.length);
        if (versions.length > 0) {
            this.logger.debug('index loaded', { artifact, versions: versions.length, head });
        }
        return { versions, head };
    }

    private async head_read(artifact: string, count: number): Promise<number> {
        const path: string = headPath_resolve(artifact);
        const raw: string | null = await this.backend.object_read(path);
        if (raw === null) return count;
        const head: HeadRecord = record_decode(HeadRecordSchema, raw, path);
        if (head.sequence > count) {
            throw new IntegrityViolationError(`HEAD of '${artifact}' points at missing version ${head.sequence}`);
        }
        return head.sequence;
    }

    // ─── Writes ─────────────────────────────────────────────────

    private async head_write(artifact: string, sequence: number): Promise<void> {
        const head: HeadRecord = { sequence };
        await this.backend.object_write(headPath_resolve(artifact), JSON.stringify(head));
    }

    /** Persist a changed copy of `version`, then swap it into the index. */
    private async version_replace(
        index: ArtifactIndex,
        version: Version,
        changes: Partial<Pick<VersionRecord, 'tags' | 'metrics'>>,
    ): Promise<Version> {
        const record: VersionRecord = { ...version_thaw(version), ...changes };
        await this.backend.object_write(versionPath_resolve(version.artifact, version.sequence), JSON.stringify(record));
        const updated: Version = version_freeze(record);
        index.versions[version.sequence - 1] = updated;
        return updated;
    }

    private async record_rollback(recordPath: string, cause: unknown): Promise<void> {
        try {
            await this.backend.object_remove(recordPath);
        } catch (error: unknown) {
            this.logger.error('failed to roll back version record', {
                path: recordPath,
                cause: cause instanceof Error ? cause.message : String(cause),
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    // ─── Helpers ────────────────────────────────────────────────

    private variables_derive(artifact: string, content: string): Record<string, string | null> {
        try {
            return this.extractor(content);
        } catch (error: unknown) {
            this.logger.warn('template variable extraction failed; committing without variables', {
                artifact,
                error: error instanceof Error ? error.message : String(error),
            });
            return {};
        }
    }

    private inFlight_add(fingerprint: string): void {
        this.inFlight.set(fingerprint, (this.inFlight.get(fingerprint) ?? 0) + 1);
    }

    private inFlight_remove(fingerprint: string): void {
        const remaining: number = (this.inFlight.get(fingerprint) ?? 1) - 1;
        if (remaining <= 0) this.inFlight.delete(fingerprint);
        else this.inFlight.set(fingerprint, remaining);
    }

    private event_emit(event: HistoryEvent): void {
        this.bus?.emit(event);
    }
}

// ─── Paths and Records ──────────────────────────────────────────

export function versionPath_resolve(artifact: string, sequence: number): string {
    return `${ARTIFACTS_ROOT}/${artifact}/versions/${String(sequence).padStart(SEQUENCE_WIDTH, '0')}.json`;
}

export function headPath_resolve(artifact: string): string {
    return `${ARTIFACTS_ROOT}/${artifact}/HEAD.json`;
}

function version_lookup(artifact: string, index: ArtifactIndex, sequence: number): Version {
    const valid: boolean = SequenceSchema.safeParse(sequence).success && sequence >= 1 && sequence <= index.versions.length;
    if (!valid) {
        throw new VersionNotFoundError(artifact, sequence, index.versions.length);
    }
    return index.versions[sequence - 1];
}

function version_freeze(record: VersionRecord): Version {
    return Object.freeze({
        ...record,
        variables: Object.freeze({ ...record.variables }),
        tags: Object.freeze([...record.tags]),
        metrics: Object.freeze({ ...record.metrics }),
    });
}

function version_thaw(version: Version): VersionRecord {
    return {
        ...version,
        variables: { ...version.variables },
        tags: [...version.tags],
        metrics: { ...version.metrics },
    };
}
