/**
 * Lexer worker threads
 *
 * Each worker evaluates the compiled grammar once and then tokenizes the
 * chunks posted to it, one at a time. Only the parse tree crosses the
 * thread boundary: frames are built on the calling thread, so their
 * identifiers are interned in the reader's own `IdentCache`.
 *
 * Grammar failures come back as plain records and become SYNTAX_ERROR
 * exceptions here, with the chunk's offsets and path applied.
 */

import { Worker } from 'worker_threads';
import { z } from 'zod';
import type { Frame } from '../types/clauses.js';
import type { Pair, SourceOffsets } from '../types/parser.js';
import type { IdentCache } from '../ident/cache.js';
import { Lexer } from '../syntax/lexer.js';
import { buildChunk, chunkOffsets, chunkRule } from './chunks.js';
import type { FrameChunk } from './splitter.js';

function workerScript(parserSource: string): string {
    return `
const { parentPort } = require('worker_threads');
const parser = (0, eval)(${JSON.stringify(parserSource)});
parentPort.on('message', (request) => {
    let reply;
    try {
        reply = { id: request.id, pair: parser.parse(request.text, request.options) };
    } catch (error) {
        reply = error instanceof parser.SyntaxError
            ? { id: request.id, failure: { message: error.message, found: error.found, location: error.location } }
            : { id: request.id, crash: error instanceof Error ? error.message : String(error) };
    }
    parentPort.postMessage(reply);
});
`;
}

function isPair(value: unknown): value is Pair {
    return (
        typeof value === 'object' &&
        value !== null &&
        'rule' in value &&
        typeof value.rule === 'string' &&
        'text' in value &&
        typeof value.text === 'string' &&
        'inner' in value &&
        Array.isArray(value.inner)
    );
}

const positionSchema = z.object({ offset: z.number(), line: z.number(), column: z.number() });

const replySchema = z.object({
    id: z.number(),
    pair: z.custom<Pair>(isPair).optional(),
    failure: z
        .object({
            message: z.string(),
            found: z.string().nullable(),
            location: z.object({ start: positionSchema, end: positionSchema }),
        })
        .optional(),
    crash: z.string().optional(),
});

interface Request {
    text: string;
    offsets: SourceOffsets;
    resolve(pair: Pair): void;
    reject(error: unknown): void;
}

class LexerWorker {
    private readonly worker: Worker;
    private readonly requests = new Map<number, Request>();
    private nextId = 0;

    constructor(parserSource: string) {
        this.worker = new Worker(workerScript(parserSource), { eval: true });
        this.worker.on('message', (message: unknown) => this.settle(message));
        this.worker.on('error', (error) => this.failAll(error));
        this.worker.on('exit', (code) => this.failAll(new Error(`Lexer worker exited with code ${code}`)));
    }

    tokenize(chunk: FrameChunk, offsets: SourceOffsets): Promise<Pair> {
        const id = this.nextId++;
        return new Promise<Pair>((resolve, reject) => {
            this.requests.set(id, { text: chunk.text, offsets, resolve, reject });
            this.worker.postMessage({ id, text: chunk.text, options: Lexer.parseOptions(chunkRule(chunk), offsets) });
        });
    }

    async terminate(): Promise<void> {
        await this.worker.terminate();
    }

    private settle(message: unknown): void {
        const parsed = replySchema.safeParse(message);
        if (!parsed.success) {
            this.failAll(new Error(`Malformed lexer worker reply: ${parsed.error.message}`));
            return;
        }
        const reply = parsed.data;
        const request = this.requests.get(reply.id);
        if (!request) {
            return;
        }
        this.requests.delete(reply.id);
        if (reply.pair) {
            request.resolve(reply.pair);
        } else if (reply.failure) {
            request.reject(Lexer.failure(reply.failure, request.text, request.offsets));
        } else {
            request.reject(new Error(`Lexer worker failed: ${reply.crash ?? 'no result'}`));
        }
    }

    private failAll(error: unknown): void {
        for (const request of this.requests.values()) {
            request.reject(error);
        }
        this.requests.clear();
    }
}

/**
 * Worker threads shared by the consumers of a pooled reader. A worker is
 * started the first time no idle one is left, so the pool never holds
 * more workers than there were concurrent chunks.
 */
export class LexerPool {
    private readonly idle: LexerWorker[] = [];
    private readonly workers: LexerWorker[] = [];
    private closed = false;

    get size(): number {
        return this.workers.length;
    }

    /**
     * Tokenize a chunk on a worker thread and build its frame here.
     * @throws OboException with code SYNTAX_ERROR
     */
    async parseChunk(chunk: FrameChunk, cache: IdentCache, path?: string): Promise<Frame> {
        const worker = this.acquire();
        let pair: Pair;
        try {
            pair = await worker.tokenize(chunk, chunkOffsets(chunk, path));
        } finally {
            this.idle.push(worker);
        }
        return buildChunk(chunk, pair, cache, path);
    }

    /** Stop every worker; pending chunks fail. */
    async close(): Promise<void> {
        this.closed = true;
        this.idle.length = 0;
        await Promise.all(this.workers.map((worker) => worker.terminate()));
    }

    private acquire(): LexerWorker {
        if (this.closed) {
            throw new Error('Lexer pool is closed');
        }
        const idle = this.idle.pop();
        if (idle) {
            return idle;
        }
        const worker = new LexerWorker(Lexer.source());
        this.workers.push(worker);
        return worker;
    }
}
