/**
 * @file Bisect Manager
 *
 * Persists one bisect session per artifact at `artifacts/<name>/bisect.json`
 * and hands out BisectSession handles bound to a session id. Transitions
 * for one artifact are serialized; sessions on different artifacts are
 * independent. Every transition is computed by the pure machine and only
 * becomes visible once its state record is written.
 *
 * @module bisect/BisectManager
 */

import { randomBytes } from 'crypto';
import { SessionNotActiveError, VersionNotFoundError } from '../core/errors.js';
import type { HistoryBus } from '../core/events.js';
import { KeyedLock } from '../core/lock.js';
import { Logger } from '../core/log.js';
import { input_validate, record_decode } from '../core/validation.js';
import type { SemanticDiff } from '../diff/types.js';
import type { HistoryGraph } from '../history/HistoryGraph.js';
import { ArtifactNameSchema } from '../history/schemas.js';
import type { Clock, Version } from '../history/types.js';
import type { StorageBackend } from '../store/types.js';
import { bisect_mark, bisect_reset, bisect_start, bisectLog_empty, bisectLog_fromState } from './machine.js';
import { BisectStateSchema } from './schemas.js';
import type { BisectLog, BisectPredicate, BisectReport, BisectState, BisectVerdict } from './types.js';

export interface BisectManagerOptions {
    bus?: HistoryBus;
    logger?: Logger;
    clock?: Clock;
    sessionId_generate?: () => string;
}

export interface BisectBounds {
    /** Known-good sequence. Defaults to the first version. */
    good?: number;
    /** Known-bad sequence. Defaults to HEAD. */
    bad?: number;
}

export class BisectManager {
    private readonly bus: HistoryBus | null;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly sessionId_generate: () => string;
    private readonly locks: KeyedLock = new KeyedLock();

    constructor(
        private readonly history: HistoryGraph,
        private readonly backend: StorageBackend,
        options: BisectManagerOptions = {},
    ) {
        this.bus = options.bus ?? null;
        this.logger = options.logger ?? new Logger('bisect', 'warn');
        this.clock = options.clock ?? ((): Date => new Date());
        this.sessionId_generate = options.sessionId_generate ?? sessionId_random;
    }

    /**
     * Start a session on `artifact`.
     *
     * @throws {SessionInProgressError} If a session is already active
     * @throws {VersionNotFoundError} If a bound names a missing version
     * @throws {InvalidRangeError} If good is not older than bad
     */
    async start(artifact: string, failingInput: string, bounds: BisectBounds = {}): Promise<BisectSession> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        return this.locks.run(artifact, async (): Promise<BisectSession> => {
            const previous: BisectState | null = await this.state_read(artifact);
            const count: number = await this.history.versions_count(artifact);
            const low: number = bounds.good ?? 1;
            const high: number = bounds.bad ?? (await this.history.head_get(artifact)).sequence;
            for (const sequence of [low, high]) {
                if (!Number.isInteger(sequence) || sequence < 1 || sequence > count) {
                    throw new VersionNotFoundError(artifact, sequence, count);
                }
            }

            const state: BisectState = bisect_start(previous, {
                artifact,
                sessionId: this.sessionId_generate(),
                failingInput,
                low,
                high,
                at: this.clock().toISOString(),
            });
            await this.state_write(state);

            this.bus?.emit({
                type: 'bisect_start',
                artifact,
                sessionId: state.sessionId,
                low: state.low,
                high: state.high,
                current: state.current,
            });
            this.convergence_announce(state);
            this.logger.info('bisect started', { artifact, low, high, current: state.current });
            return new BisectSession(this, artifact, state.sessionId);
        });
    }

    /** Handle for the artifact's most recent session, or null if none was ever started. */
    async session(artifact: string): Promise<BisectSession | null> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const state: BisectState | null = await this.state_read(artifact);
        return state ? new BisectSession(this, artifact, state.sessionId) : null;
    }

    /** Current log for the artifact, `uninitialized` when no session exists. */
    async log(artifact: string): Promise<BisectLog> {
        input_validate(ArtifactNameSchema, artifact, 'artifact name');
        const state: BisectState | null = await this.state_read(artifact);
        return state ? bisectLog_fromState(state) : bisectLog_empty(artifact);
    }

    // ─── Session Operations ─────────────────────────────────────

    /** @internal Used by BisectSession. */
    async session_mark(artifact: string, sessionId: string, verdict: BisectVerdict, sequence?: number): Promise<BisectLog> {
        return this.locks.run(artifact, async (): Promise<BisectLog> => {
            const state: BisectState = await this.state_require(artifact, sessionId);
            const next: BisectState = bisect_mark(state, verdict, sequence, this.clock().toISOString());
            if (next === state) {
                this.logger.debug('boundary judgment ignored', { artifact, sequence, verdict });
                return bisectLog_fromState(state);
            }
            await this.state_write(next);

            const judged: number = next.judgments[next.judgments.length - 1].sequence;
            this.bus?.emit({
                type: 'bisect_mark',
                artifact,
                sessionId,
                sequence: judged,
                verdict,
                low: next.low,
                high: next.high,
                current: next.current,
            });
            this.convergence_announce(next);
            return bisectLog_fromState(next);
        });
    }

    /** @internal Used by BisectSession. */
    async session_reset(artifact: string, sessionId: string): Promise<BisectLog> {
        return this.locks.run(artifact, async (): Promise<BisectLog> => {
            const state: BisectState = await this.state_require(artifact, sessionId);
            const next: BisectState = bisect_reset(state, this.clock().toISOString());
            if (next !== state) {
                await this.state_write(next);
                this.bus?.emit({ type: 'bisect_reset', artifact, sessionId });
            }
            return bisectLog_fromState(next);
        });
    }

    /** @internal Used by BisectSession. */
    async session_log(artifact: string, sessionId: string): Promise<BisectLog> {
        return bisectLog_fromState(await this.state_require(artifact, sessionId));
    }

    /** @internal Used by BisectSession. */
    async session_report(artifact: string, sessionId: string): Promise<BisectReport> {
        const state: BisectState = await this.state_require(artifact, sessionId);
        if (state.status !== 'converged' || state.firstBad === null) {
            throw new SessionNotActiveError(artifact, state.status);
        }
        const firstBad: Version = await this.history.version_get(artifact, state.firstBad);
        const lastGood: Version = await this.history.version_get(artifact, state.low);
        const diff: SemanticDiff = await this.history.diff(artifact, state.low, state.firstBad);
        return {
            artifact,
            sessionId,
            failingInput: state.failingInput,
            firstBad,
            lastGood,
            judgments: state.judgments.slice(),
            diff,
        };
    }

    /** @internal Used by BisectSession. */
    async session_run(artifact: string, sessionId: string, predicate: BisectPredicate): Promise<BisectReport> {
        let state: BisectState = await this.state_require(artifact, sessionId);
        while (state.status === 'active' && state.current !== null) {
            const sequence: number = state.current;
            const version: Version = await this.history.version_get(artifact, sequence);
            const content: string = await this.history.content_get(artifact, sequence);
            const verdict: BisectVerdict = await predicate(version, content, state.failingInput);
            this.logger.debug('predicate judged version', { artifact, sequence, verdict });
            await this.session_mark(artifact, sessionId, verdict, sequence);
            state = await this.state_require(artifact, sessionId);
        }
        return this.session_report(artifact, sessionId);
    }

    // ─── Persistence ────────────────────────────────────────────

    private async state_read(artifact: string): Promise<BisectState | null> {
        const path: string = statePath_resolve(artifact);
        const raw: string | null = await this.backend.object_read(path);
        return raw === null ? null : record_decode(BisectStateSchema, raw, path);
    }

    private async state_require(artifact: string, sessionId: string): Promise<BisectState> {
        const state: BisectState | null = await this.state_read(artifact);
        if (state === null) {
            throw new SessionNotActiveError(artifact, 'uninitialized');
        }
        if (state.sessionId !== sessionId) {
            throw new SessionNotActiveError(artifact, 'superseded');
        }
        return state;
    }

    private async state_write(state: BisectState): Promise<void> {
        await this.backend.object_write(statePath_resolve(state.artifact), JSON.stringify(state));
    }

    private convergence_announce(state: BisectState): void {
        if (state.status !== 'converged' || state.firstBad === null) return;
        this.bus?.emit({ type: 'bisect_converged', artifact: state.artifact, sessionId: state.sessionId, firstBad: state.firstBad });
        this.logger.info('bisect converged', { artifact: state.artifact, firstBad: state.firstBad });
    }
}

/**
 * Handle on one bisect session. Operations on a handle whose session has
 * been replaced by a newer one fail with SessionNotActiveError.
 */
export class BisectSession {
    constructor(
        private readonly manager: BisectManager,
        readonly artifact: string,
        readonly sessionId: string,
    ) {}

    /**
     * Record a judgment on `sequence` (default: the version under test).
     *
     * @throws {OutOfRangeError} If the version is already excluded
     * @throws {SessionNotActiveError} Once the session is closed
     */
    mark(verdict: BisectVerdict, sequence?: number): Promise<BisectLog> {
        return this.manager.session_mark(this.artifact, this.sessionId, verdict, sequence);
    }

    log(): Promise<BisectLog> {
        return this.manager.session_log(this.artifact, this.sessionId);
    }

    reset(): Promise<BisectLog> {
        return this.manager.session_reset(this.artifact, this.sessionId);
    }

    /** Judge with `predicate` until the session converges, then report. Predicate errors propagate. */
    run(predicate: BisectPredicate): Promise<BisectReport> {
        return this.manager.session_run(this.artifact, this.sessionId, predicate);
    }

    /** @throws {SessionNotActiveError} Unless the session has converged */
    report(): Promise<BisectReport> {
        return this.manager.session_report(this.artifact, this.sessionId);
    }
}

export function statePath_resolve(artifact: string): string {
    return `artifacts/${artifact}/bisect.json`;
}

function sessionId_random(): string {
    return `bisect-${Date.now().toString(36)}-${randomBytes(4).toString('hex')}`;
}
