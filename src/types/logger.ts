/**
 * Reader logging
 *
 * Frame readers report their lifecycle through a `ReaderLogger` and never
 * write to the console on their own.
 */

export type ReaderEvent = 'reader.started' | 'reader.completed' | 'reader.failed' | 'reader.cancelled';

export interface ReaderLogEntry {
    readonly level: 'debug' | 'warn';
    readonly event: ReaderEvent;
    readonly elapsedMs?: number;
    readonly data: Readonly<Record<string, string | number | boolean>>;
}

export interface ReaderLogger {
    log(entry: ReaderLogEntry): void;
}

/** Prints every entry on stderr. */
export const consoleLogger: ReaderLogger = {
    log({ level, event, elapsedMs, data }) {
        console.error(`[obo-reader] ${level} ${event}`, elapsedMs === undefined ? data : { ...data, elapsedMs });
    },
};

export const noopLogger: ReaderLogger = {
    log() {
        // noop
    },
};
