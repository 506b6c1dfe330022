/**
 * @file Bisect State Machine
 *
 * Pure transitions over BisectState. Nothing here touches storage or the
 * clock; callers pass timestamps in and persist what comes out.
 *
 * @module bisect/machine
 */

import {
    InvalidInputError,
    InvalidRangeError,
    OutOfRangeError,
    SessionInProgressError,
    SessionNotActiveError,
} from '../core/errors.js';
import type { BisectJudgment, BisectLog, BisectState, BisectVerdict } from './types.js';

export interface BisectStartParams {
    artifact: string;
    sessionId: string;
    failingInput: string;
    low: number;
    high: number;
    at: string;
}

/**
 * Next version to test. Rounds down, so an even-sized interval is split
 * toward the older half.
 */
export function bisect_midpoint(low: number, high: number): number {
    return low + Math.floor((high - low) / 2);
}

/**
 * Open a session over (low, high). A range with no version strictly
 * inside it is already converged.
 *
 * @param previous - The artifact's last session, if any
 * @throws {SessionInProgressError} If `previous` is still active
 * @throws {InvalidRangeError} If `low >= high`
 */
export function bisect_start(previous: BisectState | null, params: BisectStartParams): BisectState {
    if (previous?.status === 'active') {
        throw new SessionInProgressError(params.artifact);
    }
    if (params.low >= params.high) {
        throw new InvalidRangeError(params.low, params.high);
    }
    return bounds_apply(
        {
            artifact: params.artifact,
            sessionId: params.sessionId,
            status: 'active',
            low: params.low,
            high: params.high,
            current: null,
            failingInput: params.failingInput,
            judgments: [],
            startedAt: params.at,
            completedAt: null,
            firstBad: null,
        },
        params.at,
    );
}

/**
 * Apply one judgment. A judgment on `low` or `high` themselves adds no
 * information and returns `state` unchanged.
 *
 * @param sequence - Defaults to `state.current`
 * @throws {SessionNotActiveError} Unless the session is active
 * @throws {OutOfRangeError} If `sequence` lies outside [low, high]
 */
export function bisect_mark(
    state: BisectState,
    verdict: BisectVerdict,
    sequence: number | undefined,
    at: string,
): BisectState {
    if (state.status !== 'active' || state.current === null) {
        throw new SessionNotActiveError(state.artifact, state.status);
    }
    const target: number = sequence ?? state.current;
    if (!Number.isInteger(target)) {
        throw new InvalidInputError(`Bisect judgment needs an integer sequence, got ${target}`);
    }
    if (target === state.low || target === state.high) {
        return state;
    }
    if (target < state.low || target > state.high) {
        throw new OutOfRangeError(target, state.low, state.high);
    }

    const judgment: BisectJudgment = { sequence: target, verdict, at };
    return bounds_apply(
        {
            ...state,
            low: verdict === 'good' ? target : state.low,
            high: verdict === 'bad' ? target : state.high,
            judgments: [...state.judgments, judgment],
        },
        at,
    );
}

/** Abandon the session from any state. Resetting an abandoned session is a no-op. */
export function bisect_reset(state: BisectState, at: string): BisectState {
    if (state.status === 'abandoned') return state;
    return { ...state, status: 'abandoned', current: null, completedAt: at };
}

/** Recompute `current`, converging when low and high are adjacent. */
function bounds_apply(state: BisectState, at: string): BisectState {
    if (state.high - state.low === 1) {
        return { ...state, status: 'converged', current: null, firstBad: state.high, completedAt: at };
    }
    return { ...state, current: bisect_midpoint(state.low, state.high) };
}

export function bisectLog_fromState(state: BisectState): BisectLog {
    return {
        artifact: state.artifact,
        sessionId: state.sessionId,
        status: state.status,
        low: state.low,
        high: state.high,
        current: state.current,
        firstBad: state.firstBad,
        failingInput: state.failingInput,
        judgments: state.judgments.slice(),
    };
}

export function bisectLog_empty(artifact: string): BisectLog {
    return {
        artifact,
        sessionId: null,
        status: 'uninitialized',
        low: null,
        high: null,
        current: null,
        firstBad: null,
        failingInput: null,
        judgments: [],
    };
}
