/**
 * Frame reader factory
 *
 * `createFrameReader` picks the sequential reader for zero or one thread
 * and the pooled reader otherwise. Both yield the header frame first and
 * then every entity frame; only the order of entity frames may differ.
 */

import type { Frame } from '../types/clauses.js';
import { createInvalidOptionsError } from '../types/errors.js';
import { resolveReaderOptions, type ReaderOptions, type ResolvedReaderOptions } from '../types/options.js';
import { IdentCache } from '../ident/cache.js';
import { readSequential } from './sequential.js';
import { readPooled } from './threaded.js';
import { FrameSplitter, type FrameSource } from './splitter.js';

export { Channel } from './channel.js';
export { FrameSplitter, type FrameChunk, type FrameSource } from './splitter.js';
export { buildChunk, parseChunk } from './chunks.js';
export { LexerPool } from './workers.js';
export { readSequential, type ReaderContext } from './sequential.js';
export { readPooled, type PoolOptions } from './threaded.js';

export class FrameReader implements AsyncIterable<Frame> {
    /** Identifier cache shared by every worker of this reader. */
    readonly cache = new IdentCache();
    private started = false;

    constructor(
        private readonly input: FrameSource,
        readonly options: ResolvedReaderOptions
    ) {}

    get isSequential(): boolean {
        return this.options.threads <= 1;
    }

    /** A reader over the same input delivering frames in input order or not. */
    ordered(flag = true): FrameReader {
        return this.reconfigure({ ordered: flag });
    }

    withThreads(threads: number): FrameReader {
        return this.reconfigure({ threads });
    }

    private reconfigure(changes: ReaderOptions): FrameReader {
        if (this.started) {
            throw createInvalidOptionsError('a reader cannot be reconfigured once iteration has started');
        }
        const { logger, path, ...rest } = this.options;
        return new FrameReader(
            this.input,
            resolveReaderOptions({ ...rest, logger, ...(path !== undefined && { path }), ...changes })
        );
    }

    [Symbol.asyncIterator](): AsyncGenerator<Frame, void, undefined> {
        if (this.started) {
            throw createInvalidOptionsError('a reader can only be iterated once');
        }
        this.started = true;
        const chunks = new FrameSplitter(this.input);
        const context = {
            cache: this.cache,
            logger: this.options.logger,
            ...(this.options.path !== undefined && { path: this.options.path }),
        };
        return this.isSequential
            ? readSequential(chunks, context)
            : readPooled(chunks, context, this.options);
    }
}

/**
 * Stream frames out of `input`: the header first, then entity frames.
 * @throws OboException with code INVALID_OPTIONS
 */
export function createFrameReader(input: FrameSource, options: ReaderOptions = {}): FrameReader {
    return new FrameReader(input, resolveReaderOptions(options));
}
