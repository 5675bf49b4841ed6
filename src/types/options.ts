import * as os from 'os';
import { z } from 'zod';
import { createInvalidOptionsError } from './errors.js';
import { noopLogger, type ReaderLogger } from './logger.js';

export interface ReaderOptions {
    /**
     * Number of frame parsing workers. `0` or `1` parses on the caller.
     * Defaults to `OBO_THREADS` or the available parallelism.
     */
    threads?: number;
    /** Yield frames in input order instead of completion order. */
    ordered?: boolean;
    /** Slots per worker in the work and result channels. */
    bufferPerThread?: number;
    logger?: ReaderLogger;
    /** Source file, reported in syntax errors. */
    path?: string;
}

export interface ResolvedReaderOptions {
    threads: number;
    ordered: boolean;
    bufferPerThread: number;
    logger: ReaderLogger;
    path?: string;
}

export const DEFAULTS = {
    ordered: false,
    bufferPerThread: 4,
    threadsEnv: 'OBO_THREADS',
} as const;

const loggerSchema = z.custom<ReaderLogger>(
    (value) => typeof value === 'object' && value !== null && 'log' in value && typeof value.log === 'function',
    { message: 'logger must provide a log(entry) method' }
);

export const readerOptionsSchema = z.object({
    threads: z.number().int().min(0).optional(),
    ordered: z.boolean().optional(),
    bufferPerThread: z.number().int().positive().optional(),
    logger: loggerSchema.optional(),
    path: z.string().optional(),
});

function threadsFromEnv(): number | undefined {
    const raw = process.env[DEFAULTS.threadsEnv];
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    const threads = Number(raw);
    if (!Number.isInteger(threads) || threads < 0) {
        throw createInvalidOptionsError(`${DEFAULTS.threadsEnv} must be a non-negative integer, got '${raw}'`, {
            variable: DEFAULTS.threadsEnv,
            value: raw,
        });
    }
    return threads;
}

/**
 * Validate reader options and fill in defaults.
 */
export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
    const result = readerOptionsSchema.safeParse(options);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
        throw createInvalidOptionsError(issues.join('; '), { issues });
    }
    const parsed = result.data;
    return {
        threads: parsed.threads ?? threadsFromEnv() ?? os.availableParallelism(),
        ordered: parsed.ordered ?? DEFAULTS.ordered,
        bufferPerThread: parsed.bufferPerThread ?? DEFAULTS.bufferPerThread,
        logger: parsed.logger ?? noopLogger,
        ...(parsed.path !== undefined && { path: parsed.path }),
    };
}
