/**
 * @file Bisect Tests
 *
 * The pure state machine, the persisted manager with its session handles,
 * and report rendering.
 *
 * @module bisect
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    InvalidInputError,
    InvalidRangeError,
    OutOfRangeError,
    SessionInProgressError,
    SessionNotActiveError,
    VersionNotFoundError,
} from '../core/errors.js';
import type { HistoryEvent } from '../core/events.js';
import type { HistoryGraph } from '../history/HistoryGraph.js';
import type { Version } from '../history/types.js';
import { commits_apply, FIXED_INSTANT, FlakyBackend, fixedClock, history_create, type HistoryFixture } from '../testing/fixtures.js';
import { BisectManager, BisectSession, statePath_resolve } from './BisectManager.js';
import { bisect_mark, bisect_midpoint, bisect_reset, bisect_start, bisectLog_fromState } from './machine.js';
import { bisectReport_render } from './render.js';
import type { BisectLog, BisectReport, BisectState, BisectVerdict } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const AT: string = FIXED_INSTANT;

function state_start(low: number, high: number): BisectState {
    return bisect_start(null, { artifact: 'support', sessionId: 's1', failingInput: 'refund question', low, high, at: AT });
}

/** Ten versions; the refusal line first appears in version 4. */
function texts_make(): string[] {
    const texts: string[] = [];
    for (let i = 1; i <= 10; i++) {
        texts.push(i < 4 ? `Base prompt.\nRevision ${i}` : `Base prompt.\nRevision ${i}\nNever apologize.`);
    }
    return texts;
}

const contentVerdict = (_version: Version, content: string): BisectVerdict =>
    content.includes('Never apologize.') ? 'bad' : 'good';

// ═══════════════════════════════════════════════════════════════════
// State Machine
// ═══════════════════════════════════════════════════════════════════

describe('bisect/machine', (): void => {
    it('rounds the midpoint down', (): void => {
        expect(bisect_midpoint(1, 10)).toBe(5);
        expect(bisect_midpoint(1, 4)).toBe(2);
        expect(bisect_midpoint(3, 5)).toBe(4);
    });

    it('walks the ten-version scenario to version 4', (): void => {
        let state: BisectState = state_start(1, 10);
        expect(state.status).toBe('active');
        expect(state.current).toBe(5);

        state = bisect_mark(state, 'bad', undefined, AT);
        expect([state.low, state.high, state.current]).toEqual([1, 5, 3]);

        state = bisect_mark(state, 'good', undefined, AT);
        expect([state.low, state.high, state.current]).toEqual([3, 5, 4]);

        state = bisect_mark(state, 'bad', undefined, AT);
        expect(state.status).toBe('converged');
        expect(state.firstBad).toBe(4);
        expect(state.current).toBeNull();
        expect(state.completedAt).toBe(AT);
        expect(state.judgments.map((j) => [j.sequence, j.verdict])).toEqual([[5, 'bad'], [3, 'good'], [4, 'bad']]);
    });

    it('converges at once when the bounds are adjacent', (): void => {
        const state: BisectState = state_start(6, 7);
        expect(state.status).toBe('converged');
        expect(state.firstBad).toBe(7);
        expect(state.judgments).toEqual([]);
    });

    it('rejects an empty or inverted range', (): void => {
        expect(() => state_start(5, 5)).toThrow(InvalidRangeError);
        expect(() => state_start(8, 2)).toThrow('Invalid bisect range: good=8 must be older than bad=2');
    });

    it('refuses to start over an active session', (): void => {
        const active: BisectState = state_start(1, 10);
        expect(() => bisect_start(active, { artifact: 'support', sessionId: 's2', failingInput: '', low: 1, high: 3, at: AT }))
            .toThrow(SessionInProgressError);
        const abandoned: BisectState = bisect_reset(active, AT);
        expect(bisect_start(abandoned, { artifact: 'support', sessionId: 's2', failingInput: '', low: 1, high: 3, at: AT }).current)
            .toBe(2);
    });

    it('accepts a judgment on any version inside the interval', (): void => {
        const state: BisectState = bisect_mark(state_start(1, 10), 'good', 7, AT);
        expect([state.low, state.high, state.current]).toEqual([7, 10, 8]);
    });

    it('treats a judgment on either bound as a no-op', (): void => {
        const state: BisectState = state_start(1, 10);
        expect(bisect_mark(state, 'bad', 10, AT)).toBe(state);
        expect(bisect_mark(state, 'good', 1, AT)).toBe(state);
    });

    it('reports the valid bounds for an out-of-range judgment', (): void => {
        const state: BisectState = bisect_mark(state_start(1, 10), 'bad', 5, AT);
        try {
            bisect_mark(state, 'good', 8, AT);
            expect.unreachable();
        } catch (error: unknown) {
            expect(error).toBeInstanceOf(OutOfRangeError);
            expect(error).toMatchObject({ sequence: 8, low: 1, high: 5 });
        }
    });

    it('rejects a non-integer sequence', (): void => {
        expect(() => bisect_mark(state_start(1, 10), 'good', 2.5, AT)).toThrow(InvalidInputError);
    });

    it('refuses judgments once closed', (): void => {
        const converged: BisectState = state_start(2, 3);
        expect(() => bisect_mark(converged, 'good', undefined, AT)).toThrow(SessionNotActiveError);
        const abandoned: BisectState = bisect_reset(state_start(1, 10), AT);
        expect(abandoned.status).toBe('abandoned');
        expect(abandoned.current).toBeNull();
        expect(() => bisect_mark(abandoned, 'bad', undefined, AT)).toThrow(
            "No active bisect session for 'support' (status: abandoned)",
        );
    });

    it('abandons a converged session and ignores a repeated reset', (): void => {
        const abandoned: BisectState = bisect_reset(state_start(2, 3), AT);
        expect(abandoned.status).toBe('abandoned');
        expect(bisect_reset(abandoned, AT)).toBe(abandoned);
    });

    it('copies judgments into the log', (): void => {
        const state: BisectState = bisect_mark(state_start(1, 10), 'bad', undefined, AT);
        const log: BisectLog = bisectLog_fromState(state);
        expect(log).toMatchObject({ sessionId: 's1', status: 'active', low: 1, high: 5, current: 3, failingInput: 'refund question' });
        expect(log.judgments).not.toBe(state.judgments);
        expect(log.judgments).toEqual(state.judgments);
    });
});

// ═══════════════════════════════════════════════════════════════════
// BisectManager
// ═══════════════════════════════════════════════════════════════════

describe('bisect/BisectManager', (): void => {
    let fixture: HistoryFixture;
    let history: HistoryGraph;
    let manager: BisectManager;
    let counter: number;

    beforeEach(async (): Promise<void> => {
        fixture = history_create();
        history = fixture.history;
        counter = 0;
        manager = new BisectManager(history, fixture.backend, {
            bus: fixture.bus,
            clock: fixedClock,
            sessionId_generate: (): string => `session-${++counter}`,
        });
        await commits_apply(history, 'support', texts_make());
    });

    function bisectEvents(): string[] {
        return fixture.events
            .filter((event: HistoryEvent): boolean => event.type.startsWith('bisect'))
            .map((event: HistoryEvent): string => event.type);
    }

    it('defaults the bounds to the first version and HEAD', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', 'refund question');
        expect(session.sessionId).toBe('session-1');
        expect(await session.log()).toMatchObject({ status: 'active', low: 1, high: 10, current: 5 });
    });

    it('uses HEAD after a checkout as the default bad version', async (): Promise<void> => {
        await history.checkout('support', 7);
        const session: BisectSession = await manager.start('support', '');
        expect(await session.log()).toMatchObject({ low: 1, high: 7, current: 4 });
    });

    it('drives a session to convergence through its handle', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', 'refund question', { good: 1, bad: 10 });
        await session.mark('bad');
        await session.mark('good');
        const log: BisectLog = await session.mark('bad');

        expect(log.status).toBe('converged');
        expect(log.firstBad).toBe(4);
        expect(bisectEvents()).toEqual(['bisect_start', 'bisect_mark', 'bisect_mark', 'bisect_mark', 'bisect_converged']);
    });

    it('persists state so a fresh manager resumes the session', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', 'refund question');
        await session.mark('bad');

        const reopened: BisectManager = new BisectManager(history, fixture.backend);
        const resumed: BisectSession | null = await reopened.session('support');
        expect(resumed?.sessionId).toBe('session-1');
        expect(await reopened.log('support')).toMatchObject({ low: 1, high: 5, current: 3 });
    });

    it('fails a second start while a session is active', async (): Promise<void> => {
        await manager.start('support', '');
        await expect(manager.start('support', '')).rejects.toThrow(SessionInProgressError);
    });

    it('invalidates an old handle once a newer session starts', async (): Promise<void> => {
        const first: BisectSession = await manager.start('support', '');
        await first.reset();
        const second: BisectSession = await manager.start('support', '', { good: 2, bad: 9 });

        await expect(first.mark('good')).rejects.toThrow("No active bisect session for 'support' (status: superseded)");
        expect((await second.log()).sessionId).toBe('session-2');
    });

    it('reports an uninitialized log when no session was started', async (): Promise<void> => {
        expect(await manager.log('support')).toEqual({
            artifact: 'support',
            sessionId: null,
            status: 'uninitialized',
            low: null,
            high: null,
            current: null,
            firstBad: null,
            failingInput: null,
            judgments: [],
        });
        expect(await manager.session('support')).toBeNull();
    });

    it('validates the bounds against the history', async (): Promise<void> => {
        await expect(manager.start('support', '', { good: 0 })).rejects.toThrow(VersionNotFoundError);
        await expect(manager.start('support', '', { bad: 11 })).rejects.toThrow(
            "Version 11 not found: 'support' has versions 1..10",
        );
        await expect(manager.start('support', '', { good: 6, bad: 6 })).rejects.toThrow(InvalidRangeError);
    });

    it('ignores a boundary judgment without writing', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', '');
        const log: BisectLog = await session.mark('bad', 10);
        expect(log).toMatchObject({ low: 1, high: 10, current: 5, judgments: [] });
        expect(bisectEvents()).toEqual(['bisect_start']);
    });

    it('resets to abandoned and refuses further judgments', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', '');
        expect((await session.reset()).status).toBe('abandoned');
        expect((await session.reset()).status).toBe('abandoned');
        await expect(session.mark('good')).rejects.toThrow(SessionNotActiveError);
        expect(bisectEvents()).toEqual(['bisect_start', 'bisect_reset']);
    });

    it('runs a predicate to the first bad version and reports the change', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', 'refund question');
        const report: BisectReport = await session.run(contentVerdict);

        expect(report.firstBad.sequence).toBe(4);
        expect(report.lastGood.sequence).toBe(3);
        expect(report.judgments.map((j) => j.sequence)).toEqual([5, 3, 4]);
        expect(report.diff.entries.map((entry) => entry.category)).toEqual(['constraints']);
        expect(report.failingInput).toBe('refund question');
    });

    it('propagates predicate errors and keeps the judgments made so far', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', '');
        let calls: number = 0;
        await expect(session.run((): BisectVerdict => {
            calls++;
            if (calls === 2) throw new Error('judge offline');
            return 'bad';
        })).rejects.toThrow('judge offline');
        expect(await session.log()).toMatchObject({ status: 'active', low: 1, high: 5, current: 3 });
    });

    it('refuses a report before convergence', async (): Promise<void> => {
        const session: BisectSession = await manager.start('support', '');
        await expect(session.report()).rejects.toThrow(SessionNotActiveError);
    });

    it('leaves state unchanged when the judgment cannot be written', async (): Promise<void> => {
        const backend: FlakyBackend = new FlakyBackend();
        const flaky: HistoryFixture = history_create(backend);
        await commits_apply(flaky.history, 'support', texts_make());
        const flakyManager: BisectManager = new BisectManager(flaky.history, backend, { clock: fixedClock });
        const session: BisectSession = await flakyManager.start('support', '');

        backend.writeFailure_arm((path: string): boolean => path === statePath_resolve('support'));
        await expect(session.mark('bad')).rejects.toThrow('simulated write failure at artifacts/support/bisect.json');
        expect(await session.log()).toMatchObject({ low: 1, high: 10, current: 5, judgments: [] });
    });

    it('keeps sessions on different artifacts independent', async (): Promise<void> => {
        await commits_apply(history, 'billing', ['a', 'b', 'c']);
        const support: BisectSession = await manager.start('support', '');
        const billing: BisectSession = await manager.start('billing', '');
        await billing.mark('bad');
        expect((await billing.log()).status).toBe('converged');
        expect((await support.log()).status).toBe('active');
    });
});

// ═══════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════

describe('bisect/render', (): void => {
    it('renders a plain report', async (): Promise<void> => {
        const { history, backend } = history_create();
        await commits_apply(history, 'support', texts_make());
        const manager: BisectManager = new BisectManager(history, backend, { clock: fixedClock });
        const report: BisectReport = await (await manager.start('support', 'refund question')).run(contentVerdict);

        const lines: string[] = bisectReport_render(report).split('\n');
        expect(lines.slice(0, 10)).toEqual([
            'First bad version of support: 4',
            '  message: v4',
            '  author:  tester',
            'Last good version: 3',
            'Failing input: refund question',
            '',
            'Judgments (3):',
            '  v5: bad',
            '  v3: good',
            '  v4: bad',
        ]);
        expect(lines[11]).toBe('Changes 3 → 4:');
        expect(lines[12].startsWith('constraints')).toBe(true);
    });
});
