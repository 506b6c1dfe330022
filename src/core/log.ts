/**
 * @file Logger
 *
 * Leveled console logger. Lines carry a `[PROMPTLINE][<scope>]` prefix and
 * an optional JSON context suffix.
 *
 * @module core/log
 */

import type { HistoryEvent } from './events.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/** Where formatted lines go. `console` satisfies it. */
export interface LogSink {
    error(line: string): void;
    warn(line: string): void;
    info(line: string): void;
    debug(line: string): void;
}

export class Logger {
    constructor(
        private readonly scope: string,
        private level: LogLevel = 'info',
        private readonly sink: LogSink = console,
    ) {}

    level_set(level: LogLevel): void {
        this.level = level;
    }

    level_get(): LogLevel {
        return this.level;
    }

    /** Derive a logger for a sub-scope sharing this logger's level and sink. */
    child(scope: string): Logger {
        return new Logger(`${this.scope}:${scope}`, this.level, this.sink);
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.enabled('error')) this.sink.error(this.line_format(message, context));
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.enabled('warn')) this.sink.warn(this.line_format(message, context));
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.enabled('info')) this.sink.info(this.line_format(message, context));
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.enabled('debug')) this.sink.debug(this.line_format(message, context));
    }

    /** Log a bus event at debug level. Suitable as a HistoryBus observer. */
    event_log(event: HistoryEvent): void {
        const { type, ...rest } = event;
        this.debug(type, rest);
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[this.level] >= LEVEL_RANK[level];
    }

    private line_format(message: string, context?: Record<string, unknown>): string {
        const prefix: string = `[PROMPTLINE][${this.scope}]`;
        if (!context || Object.keys(context).length === 0) {
            return `${prefix} ${message}`;
        }
        return `${prefix} ${message} ${JSON.stringify(context)}`;
    }
}
