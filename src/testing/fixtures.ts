/**
 * @file Shared Test Fixtures
 *
 * In-process stand-ins used across the test suites: a fixed clock, a
 * backend that fails selected writes, a recording log sink and a
 * ready-wired history graph.
 *
 * @module testing
 */

import { HistoryBus, type HistoryEvent } from '../core/events.js';
import { Logger, type LogSink } from '../core/log.js';
import { HistoryGraph, type HistoryGraphOptions } from '../history/HistoryGraph.js';
import type { Clock } from '../history/types.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { ContentStore } from '../store/ContentStore.js';
import type { StorageBackend } from '../store/types.js';

export const FIXED_INSTANT: string = '2025-01-01T00:00:00.000Z';

export const fixedClock: Clock = (): Date => new Date(FIXED_INSTANT);

/**
 * MemoryBackend wrapper whose writes fail while a registered predicate
 * matches the target path. Each predicate fires once.
 */
export class FlakyBackend implements StorageBackend {
    readonly inner: MemoryBackend = new MemoryBackend();
    private readonly failures: Array<(path: string) => boolean> = [];

    writeFailure_arm(predicate: (path: string) => boolean): void {
        this.failures.push(predicate);
    }

    async object_write(path: string, data: string): Promise<void> {
        const index: number = this.failures.findIndex((predicate: (path: string) => boolean): boolean => predicate(path));
        if (index >= 0) {
            this.failures.splice(index, 1);
            throw new Error(`simulated write failure at ${path}`);
        }
        await this.inner.object_write(path, data);
    }

    object_read(path: string): Promise<string | null> {
        return this.inner.object_read(path);
    }

    object_remove(path: string): Promise<void> {
        return this.inner.object_remove(path);
    }

    path_exists(path: string): Promise<boolean> {
        return this.inner.path_exists(path);
    }

    children_list(path: string): Promise<string[]> {
        return this.inner.children_list(path);
    }
}

/** LogSink that keeps every line, by level. */
export class RecordingSink implements LogSink {
    readonly lines: Array<{ level: string; line: string }> = [];

    error(line: string): void {
        this.lines.push({ level: 'error', line });
    }

    warn(line: string): void {
        this.lines.push({ level: 'warn', line });
    }

    info(line: string): void {
        this.lines.push({ level: 'info', line });
    }

    debug(line: string): void {
        this.lines.push({ level: 'debug', line });
    }
}

export interface HistoryFixture {
    backend: StorageBackend;
    content: ContentStore;
    history: HistoryGraph;
    bus: HistoryBus;
    events: HistoryEvent[];
    sink: RecordingSink;
}

/** History graph over `backend` with a fixed clock, a recording bus and a quiet logger. */
export function history_create(
    backend: StorageBackend = new MemoryBackend(),
    options: HistoryGraphOptions = {},
): HistoryFixture {
    const bus: HistoryBus = new HistoryBus();
    const events: HistoryEvent[] = [];
    bus.subscribe((event: HistoryEvent): void => {
        events.push(event);
    });
    const sink: RecordingSink = new RecordingSink();
    const content: ContentStore = new ContentStore(backend, { bus });
    const history: HistoryGraph = new HistoryGraph(content, backend, {
        bus,
        clock: fixedClock,
        logger: new Logger('history', 'debug', sink),
        ...options,
    });
    return { backend, content, history, bus, events, sink };
}

/** Commit each text in order to `artifact`. */
export async function commits_apply(history: HistoryGraph, artifact: string, texts: string[]): Promise<void> {
    for (const [i, text] of texts.entries()) {
        await history.commit(artifact, text, `v${i + 1}`, 'tester');
    }
}
