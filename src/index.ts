/**
 * @file Public API
 *
 * @module promptline
 */

export * from './core/errors.js';
export { HistoryBus, type HistoryEvent, type HistoryObserver } from './core/events.js';
export { Logger, LOG_LEVELS, type LogLevel, type LogSink } from './core/log.js';
export { KeyedLock } from './core/lock.js';

export {
    SettingsService,
    SETTINGS_DEFAULTS,
    settings_load,
    settings_parseYaml,
    type RepositorySettings,
    type ResolvedSettings,
    type SettingSource,
    type StorageKind,
} from './config/settings.js';

export type { StorageBackend, FingerprintHasher, ReferenceChecker } from './store/types.js';
export { MemoryBackend } from './store/backend/memory.js';
export { FsBackend } from './store/backend/fs.js';
export { ContentStore, type ContentStoreOptions } from './store/ContentStore.js';
export { Sha256Hasher, fingerprint_compute } from './store/fingerprint.js';

export * from './diff/types.js';
export { SemanticDiffEngine, semanticDiff_isSignificant } from './diff/SemanticDiffEngine.js';
export { CLASSIFICATION_RULES, span_classify, type ClassificationRule } from './diff/rules.js';
export { spans_compute, lines_split } from './diff/alignment.js';
export { semanticDiff_render, type RenderOptions } from './diff/render.js';

export type { Version, VariableExtractor, Clock } from './history/types.js';
export { HistoryGraph, type HistoryGraphOptions, type LogOptions } from './history/HistoryGraph.js';
export { VersionLog } from './history/VersionLog.js';
export { variables_extract } from './history/variables.js';

export { MergeResolver, merge_analyze } from './merge/MergeResolver.js';
export type { MergeResult, MergeAnalysis, CategoryResolution, ResolutionStatus, ResolutionSource } from './merge/types.js';

export type {
    CompiledQuery,
    QueryExpression,
    QueryTarget,
    QueryDiagnostics,
    ComparisonOperator,
    QueryValue,
} from './query/types.js';
export { query_compile, Query } from './query/QueryEngine.js';
export { query_parse } from './query/parser.js';
export { query_print } from './query/printer.js';
export { query_tokenize } from './query/lexer.js';
export { query_evaluate } from './query/evaluator.js';
export { QueryPatterns } from './query/patterns.js';

export type {
    BisectVerdict,
    BisectStatus,
    BisectState,
    BisectLog,
    BisectJudgment,
    BisectPredicate,
    BisectReport,
} from './bisect/types.js';
export { BisectManager, BisectSession, type BisectBounds, type BisectManagerOptions } from './bisect/BisectManager.js';
export { bisect_midpoint } from './bisect/machine.js';
export { bisectReport_render } from './bisect/render.js';

export { Repository, type RepositoryOptions } from './repository/Repository.js';
