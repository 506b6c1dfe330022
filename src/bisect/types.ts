/**
 * @file Bisect Type Definitions
 *
 * A bisect session narrows the open interval (low, high) between a
 * known-good and a known-bad version of one artifact until the two are
 * adjacent; `high` is then the first bad version.
 *
 *   uninitialized ──start──► active ──mark…──► converged
 *                              │
 *                              └──reset──► abandoned
 *
 * @module bisect
 */

import type { SemanticDiff } from '../diff/types.js';
import type { Version } from '../history/types.js';

export type BisectVerdict = 'good' | 'bad';

export type BisectStatus = 'uninitialized' | 'active' | 'converged' | 'abandoned';

export interface BisectJudgment {
    sequence: number;
    verdict: BisectVerdict;
    /** ISO-8601 time the judgment was recorded. */
    at: string;
}

/**
 * Persisted state of a started session.
 *
 * @property current - Version under test; null once the session is closed
 * @property firstBad - Set on convergence
 */
export interface BisectState {
    artifact: string;
    sessionId: string;
    status: Exclude<BisectStatus, 'uninitialized'>;
    low: number;
    high: number;
    current: number | null;
    failingInput: string;
    judgments: readonly BisectJudgment[];
    startedAt: string;
    completedAt: string | null;
    firstBad: number | null;
}

/** Side-effect-free view of a session, available in every state. */
export interface BisectLog {
    artifact: string;
    sessionId: string | null;
    status: BisectStatus;
    low: number | null;
    high: number | null;
    current: number | null;
    firstBad: number | null;
    failingInput: string | null;
    judgments: readonly BisectJudgment[];
}

/**
 * Automated judge. Receives the version under test, its content and the
 * session's failing-input description.
 */
export type BisectPredicate = (
    version: Version,
    content: string,
    failingInput: string,
) => BisectVerdict | Promise<BisectVerdict>;

export interface BisectReport {
    artifact: string;
    sessionId: string;
    failingInput: string;
    firstBad: Version;
    lastGood: Version;
    judgments: readonly BisectJudgment[];
    /** Semantic change from the last good to the first bad version. */
    diff: SemanticDiff;
}
