/**
 * @file Repository
 *
 * Wires the storage backend, content store, history graph, bisect manager,
 * event bus and logger together from resolved settings.
 *
 * @module repository
 */

import { BisectManager } from '../bisect/BisectManager.js';
import type { RepositorySettings } from '../config/settings.js';
import { HistoryBus, type HistoryEvent } from '../core/events.js';
import { Logger, type LogSink } from '../core/log.js';
import { SemanticDiffEngine, semanticDiff_isSignificant } from '../diff/SemanticDiffEngine.js';
import type { SemanticAnalyzer, SemanticDiff } from '../diff/types.js';
import { HistoryGraph } from '../history/HistoryGraph.js';
import type { Clock } from '../history/types.js';
import { MergeResolver, merge_analyze } from '../merge/MergeResolver.js';
import type { MergeAnalysis } from '../merge/types.js';
import { FsBackend } from '../store/backend/fs.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { ContentStore } from '../store/ContentStore.js';
import type { FingerprintHasher, StorageBackend } from '../store/types.js';

export interface RepositoryOptions {
    /** Replaces the backend chosen by `settings.storage`. */
    backend?: StorageBackend;
    hasher?: FingerprintHasher;
    analyzer?: SemanticAnalyzer;
    clock?: Clock;
    sink?: LogSink;
}

export class Repository {
    readonly bus: HistoryBus;
    readonly logger: Logger;
    readonly content: ContentStore;
    readonly history: HistoryGraph;
    readonly bisect: BisectManager;
    readonly merger: MergeResolver;
    private readonly unsubscribe: () => void;

    private constructor(
        readonly settings: RepositorySettings,
        readonly backend: StorageBackend,
        readonly analyzer: SemanticAnalyzer,
        options: RepositoryOptions,
    ) {
        this.bus = new HistoryBus();
        this.logger = new Logger('repository', settings.logLevel, options.sink);
        this.unsubscribe = this.bus.subscribe((event: HistoryEvent): void => this.logger.event_log(event));

        this.content = new ContentStore(backend, { hasher: options.hasher, bus: this.bus });
        this.history = new HistoryGraph(this.content, backend, {
            analyzer,
            bus: this.bus,
            logger: this.logger.child('history'),
            clock: options.clock,
        });
        this.bisect = new BisectManager(this.history, backend, {
            bus: this.bus,
            logger: this.logger.child('bisect'),
            clock: options.clock,
        });
        this.merger = new MergeResolver();
    }

    static open(settings: RepositorySettings, options: RepositoryOptions = {}): Repository {
        const backend: StorageBackend = options.backend ?? backend_create(settings);
        const analyzer: SemanticAnalyzer = options.analyzer ?? new SemanticDiffEngine();
        const repository: Repository = new Repository(settings, backend, analyzer, options);
        repository.logger.debug('repository opened', { storage: settings.storage, root: settings.root });
        return repository;
    }

    /** Merge two descendants of `base` by semantic category. */
    merge(base: string, ours: string, theirs: string): MergeAnalysis {
        return merge_analyze(this.analyzer, base, ours, theirs, this.merger);
    }

    /** Whether `diff` crosses the configured significance threshold. */
    diff_isSignificant(diff: SemanticDiff): boolean {
        return semanticDiff_isSignificant(diff, this.settings.significance);
    }

    /** Detach the logger from the bus. */
    close(): void {
        this.unsubscribe();
    }
}

function backend_create(settings: RepositorySettings): StorageBackend {
    return settings.storage === 'fs' ? new FsBackend(settings.root) : new MemoryBackend();
}
