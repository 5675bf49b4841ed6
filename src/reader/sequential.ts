import type { Frame } from '../types/clauses.js';
import type { IdentCache } from '../ident/cache.js';
import type { ReaderLogger } from '../types/logger.js';
import { parseChunk } from './chunks.js';
import type { FrameChunk } from './splitter.js';

export interface ReaderContext {
    cache: IdentCache;
    logger: ReaderLogger;
    path?: string;
}

/**
 * Parse chunks one after the other on the caller.
 */
export async function* readSequential(
    chunks: AsyncIterable<FrameChunk>,
    context: ReaderContext
): AsyncGenerator<Frame, void, undefined> {
    const started = Date.now();
    let frames = 0;
    let finished = false;
    context.logger.log({ level: 'debug', event: 'reader.started', data: { threads: 1 } });
    try {
        for await (const chunk of chunks) {
            const frame = parseChunk(chunk, context.cache, context.path);
            frames++;
            yield frame;
        }
        finished = true;
        context.logger.log({
            level: 'debug',
            event: 'reader.completed',
            elapsedMs: Date.now() - started,
            data: { frames },
        });
    } catch (error) {
        finished = true;
        context.logger.log({
            level: 'warn',
            event: 'reader.failed',
            elapsedMs: Date.now() - started,
            data: { frames, message: error instanceof Error ? error.message : String(error) },
        });
        throw error;
    } finally {
        if (!finished) {
            context.logger.log({ level: 'debug', event: 'reader.cancelled', data: { frames } });
        }
    }
}
