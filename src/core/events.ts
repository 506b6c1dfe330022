/**
 * @file History Bus
 *
 * Typed facade over Node's EventEmitter for the events the history,
 * content and bisect layers emit. Observers get an unsubscribe handle.
 *
 * @module core/events
 */

import { EventEmitter } from 'events';
import type { BisectVerdict } from '../bisect/types.js';

export type HistoryEvent =
    | { type: 'blob_write'; fingerprint: string; size: number }
    | { type: 'commit'; artifact: string; sequence: number; fingerprint: string }
    | { type: 'checkout'; artifact: string; sequence: number }
    | { type: 'tag'; artifact: string; sequence: number; label: string }
    | { type: 'metric'; artifact: string; sequence: number; name: string; value: number }
    | { type: 'bisect_start'; artifact: string; sessionId: string; low: number; high: number; current: number | null }
    | {
        type: 'bisect_mark';
        artifact: string;
        sessionId: string;
        sequence: number;
        verdict: BisectVerdict;
        low: number;
        high: number;
        current: number | null;
    }
    | { type: 'bisect_converged'; artifact: string; sessionId: string; firstBad: number }
    | { type: 'bisect_reset'; artifact: string; sessionId: string };

export type HistoryObserver = (event: HistoryEvent) => void;

const CHANNEL = 'history' as const;

export class HistoryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to history events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: HistoryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: HistoryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    observers_count(): number {
        return this.emitter.listenerCount(CHANNEL);
    }
}
