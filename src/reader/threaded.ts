/**
 * Pooled frame reader
 *
 * One producer feeds frame chunks into a bounded work channel; a fixed
 * number of consumers hand them to lexer worker threads and push
 * sequence-tagged outcomes into a bounded result channel. Tokenizing runs
 * in parallel on the workers; frames are built on this thread against
 * the reader's identifier cache. The header chunk is parsed before the
 * pool starts, so it is always the first frame out.
 *
 * Delivery is either in completion order or, through a reorder buffer
 * keyed by sequence number, in input order. The first failure closes the
 * work channel, and the consumer sees it as the reader's error.
 */

import type { EntityFrame, Frame } from '../types/clauses.js';
import { Channel } from './channel.js';
import { parseChunk } from './chunks.js';
import { LexerPool } from './workers.js';
import type { ReaderContext } from './sequential.js';
import type { FrameChunk } from './splitter.js';

export interface PoolOptions {
    threads: number;
    ordered: boolean;
    bufferPerThread: number;
}

type Outcome =
    | { type: 'frame'; sequence: number; frame: Frame }
    | { type: 'error'; sequence?: number; error: unknown };

function isEntity(frame: Frame): frame is EntityFrame {
    return frame.type !== 'header';
}

export async function* readPooled(
    chunks: AsyncIterable<FrameChunk>,
    context: ReaderContext,
    options: PoolOptions
): AsyncGenerator<Frame, void, undefined> {
    const { threads, ordered, bufferPerThread } = options;
    const { logger } = context;
    const started = Date.now();
    const source = chunks[Symbol.asyncIterator]();

    logger.log({ level: 'debug', event: 'reader.started', data: { threads, ordered } });

    const first = await source.next();
    if (first.done) {
        return;
    }
    let header: Frame;
    try {
        header = parseChunk(first.value, context.cache, context.path);
    } catch (error) {
        await source.return?.();
        throw error;
    }

    const lexers = new LexerPool();
    const work = new Channel<FrameChunk>(threads * bufferPerThread);
    const results = new Channel<Outcome>(threads * bufferPerThread);
    let dispatched = 0;
    let delivered = 0;
    let finished = false;

    const produce = async (): Promise<void> => {
        try {
            for (let next = await source.next(); !next.done; next = await source.next()) {
                if (!(await work.send(next.value))) {
                    return;
                }
                dispatched++;
            }
        } catch (error) {
            work.close(true);
            await results.send({ type: 'error', error });
        } finally {
            work.close();
        }
    };

    const consume = async (): Promise<void> => {
        for (let next = await work.receive(); !next.done; next = await work.receive()) {
            const chunk = next.value;
            let outcome: Outcome;
            try {
                const frame = await lexers.parseChunk(chunk, context.cache, context.path);
                outcome = { type: 'frame', sequence: chunk.sequence, frame };
            } catch (error) {
                // stop scheduling; chunks already taken still finish
                work.close(true);
                outcome = { type: 'error', sequence: chunk.sequence, error };
            }
            if (!(await results.send(outcome))) {
                return;
            }
        }
    };

    const pool = Promise.all([produce(), ...Array.from({ length: threads }, () => consume())]).then(() =>
        results.close()
    );

    const pending = new Map<number, Outcome>();
    let expected = first.value.sequence + 1;

    const deliver = (outcome: Outcome): EntityFrame => {
        if (outcome.type === 'error') {
            throw outcome.error;
        }
        if (!isEntity(outcome.frame)) {
            throw new TypeError(`Unexpected header frame at sequence ${outcome.sequence}`);
        }
        delivered++;
        return outcome.frame;
    };

    try {
        yield header;
        for (let next = await results.receive(); !next.done; next = await results.receive()) {
            const outcome = next.value;
            if (!ordered || outcome.sequence === undefined) {
                yield deliver(outcome);
                continue;
            }
            pending.set(outcome.sequence, outcome);
            for (let ready = pending.get(expected); ready; ready = pending.get(expected)) {
                pending.delete(expected);
                expected++;
                yield deliver(ready);
            }
        }
        finished = true;
        logger.log({
            level: 'debug',
            event: 'reader.completed',
            elapsedMs: Date.now() - started,
            data: { dispatched, delivered },
        });
    } catch (error) {
        finished = true;
        logger.log({
            level: 'warn',
            event: 'reader.failed',
            elapsedMs: Date.now() - started,
            data: { dispatched, delivered, message: error instanceof Error ? error.message : String(error) },
        });
        throw error;
    } finally {
        work.close(true);
        results.close(true);
        await lexers.close();
        await pool;
        await source.return?.();
        if (!finished) {
            logger.log({ level: 'debug', event: 'reader.cancelled', data: { dispatched, delivered } });
        }
    }
}
