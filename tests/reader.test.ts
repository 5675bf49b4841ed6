/**
 * Tests for the frame splitter, the channel and the frame readers
 */

import { parseReader, parseString } from '../src/parser.js';
import { Channel, createFrameReader, FrameSplitter, type FrameChunk } from '../src/reader/index.js';
import { LexerPool } from '../src/reader/workers.js';
import { IdentCache } from '../src/ident/cache.js';
import { identToString } from '../src/ident/ident.js';
import type { Frame } from '../src/types/clauses.js';
import { isOboException } from '../src/types/errors.js';
import { noopLogger } from '../src/types/logger.js';
import { byteChunks, collect, makeOntology, recordingLogger } from './fixtures.js';

function idOf(frame: Frame): string {
    return frame.type === 'header' ? 'header' : identToString(frame.id.value);
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('expected a rejection');
}

describe('Channel', () => {
    test('rejects a capacity below one', () => {
        expect(() => new Channel<number>(0)).toThrow(RangeError);
    });

    test('delivers items in order', async () => {
        const channel = new Channel<number>(2);
        await channel.send(1);
        await channel.send(2);

        expect(channel.size).toBe(2);
        expect(await channel.receive()).toEqual({ done: false, value: 1 });
        expect(await channel.receive()).toEqual({ done: false, value: 2 });
    });

    test('send waits for room', async () => {
        const channel = new Channel<number>(1);
        await channel.send(1);

        let accepted: boolean | undefined;
        const sending = channel.send(2).then((result) => {
            accepted = result;
        });
        await Promise.resolve();
        expect(accepted).toBeUndefined();

        expect(await channel.receive()).toEqual({ done: false, value: 1 });
        await sending;
        expect(accepted).toBe(true);
        expect(channel.size).toBe(1);
    });

    test('receive waits for an item', async () => {
        const channel = new Channel<string>(1);
        const receiving = channel.receive();
        await channel.send('a');
        expect(await receiving).toEqual({ done: false, value: 'a' });
    });

    test('drains buffered items after close', async () => {
        const channel = new Channel<number>(2);
        await channel.send(1);
        channel.close();

        expect(channel.isClosed).toBe(true);
        expect(await channel.send(2)).toBe(false);
        expect(await channel.receive()).toEqual({ done: false, value: 1 });
        expect(await channel.receive()).toEqual({ done: true, value: undefined });
    });

    test('close with discard drops buffered items', async () => {
        const channel = new Channel<number>(2);
        await channel.send(1);
        channel.close(true);
        expect(await channel.receive()).toEqual({ done: true, value: undefined });
    });

    test('close wakes waiting senders and receivers', async () => {
        const full = new Channel<number>(1);
        await full.send(1);
        const sending = full.send(2);

        const empty = new Channel<number>(1);
        const receiving = empty.receive();

        full.close();
        empty.close();
        expect(await sending).toBe(false);
        expect(await receiving).toEqual({ done: true, value: undefined });
    });
});

describe('FrameSplitter', () => {
    test('cuts the header and one chunk per frame', async () => {
        const text = 'format-version: 1.4\n\n[Term]\nid: A:1\n\n[Term]\nid: A:2';
        const chunks = await collect(new FrameSplitter(text));

        expect(chunks).toEqual([
            { sequence: 0, kind: 'header', text: 'format-version: 1.4\n\n', line: 0, offset: 0 },
            { sequence: 1, kind: 'entity', text: '[Term]\nid: A:1\n\n', line: 2, offset: 21 },
            { sequence: 2, kind: 'entity', text: '[Term]\nid: A:2', line: 5, offset: 37 },
        ]);
    });

    test('emits an empty header for empty input', async () => {
        expect(await collect(new FrameSplitter(''))).toEqual([
            { sequence: 0, kind: 'header', text: '', line: 0, offset: 0 },
        ]);
    });

    test('starts a frame at an indented bracket', async () => {
        const chunks = await collect(new FrameSplitter('  [Term]\nid: A:1\n'));
        expect(chunks.map((chunk) => chunk.text)).toEqual(['', '  [Term]\nid: A:1\n']);
    });

    test('joins pieces that split lines and characters', async () => {
        const text = '[Term]\nid: A:1\nname: café\n';
        const chunks = await collect(new FrameSplitter(byteChunks(text, 3)));
        expect(chunks.map((chunk) => chunk.text)).toEqual(['', text]);
    });
});

describe('parseReader', () => {
    const text = makeOntology(50);

    test.each([0, 1, 2, 4])('matches parseString with %i threads', async (threads) => {
        const doc = await parseReader(text, { threads });
        expect(doc.equals(parseString(text))).toBe(true);
        expect(doc.entities).toHaveLength(51);
    });

    test.each([0, 2])('reads CRLF line endings with %i threads', async (threads) => {
        const input = 'format-version: 1.4\r\n\r\n[Term]\r\nid: A:1\r\nname: a cell ! note\r\n\r\n[Term]\r\nid: A:2\r\n';
        const doc = await parseReader(input, { threads });

        expect(doc.toString()).toBe(input.replace(/\r\n/g, '\n'));
        expect(doc.equals(parseString(input))).toBe(true);
    });

    test('decodes byte streams', async () => {
        const input = '[Term]\nid: A:1\nname: café\n';
        const doc = await parseReader(byteChunks(input, 5), { threads: 2 });
        expect(doc.toString()).toBe(input);
    });

    test('reports syntax errors at their document position', async () => {
        const input = 'format-version: 1.4\n\n[Term]\nid: A:1\n\n[Term]\nid: A:2\nbogus\n';

        for (const threads of [1, 2]) {
            const error = await rejection(parseReader(input, { threads, path: 'test.obo' }));
            expect(isOboException(error, 'SYNTAX_ERROR')).toBe(true);
            if (!isOboException(error)) return;
            expect(error.error.span?.line).toBe(8);
            expect(error.message).toMatch(/at test\.obo:8:1$/);
        }
    });

    test('reports a bad header from the pool', async () => {
        const error = await rejection(parseReader('bogus\n\n[Term]\nid: A:1\n', { threads: 2 }));
        expect(isOboException(error, 'SYNTAX_ERROR')).toBe(true);
    });

    test('wraps stream failures as IO errors', async () => {
        async function* failing(): AsyncGenerator<string> {
            yield 'format-version: 1.4\n';
            throw new Error('disk gone');
        }

        for (const threads of [1, 2]) {
            const error = await rejection(parseReader(failing(), { threads }));
            expect(isOboException(error, 'IO_ERROR')).toBe(true);
            if (!isOboException(error)) return;
            expect(error.message).toBe('Failed to read input: disk gone');
        }
    });
});

describe('LexerPool', () => {
    const parent: FrameChunk = { sequence: 1, kind: 'entity', text: '[Term]\nid: A:1\nis_a: A:0\n', line: 0, offset: 0 };
    const child: FrameChunk = { sequence: 2, kind: 'entity', text: '[Term]\nid: A:0\n', line: 3, offset: 25 };

    test('tokenizes on worker threads and builds into the given cache', async () => {
        const pool = new LexerPool();
        const cache = new IdentCache();
        try {
            const [first, second] = await Promise.all([parent, child].map((chunk) => pool.parseChunk(chunk, cache)));
            expect(pool.size).toBe(2);

            expect(first?.type).toBe('term');
            expect(second?.type).toBe('term');
            if (first?.type !== 'term' || second?.type !== 'term') return;
            const clause = first.clauses[0]?.value;
            if (clause?.tag !== 'is_a') throw new Error('expected is_a');
            expect(clause.value).toBe(second.id.value);
            expect(second.id.value).toBe(cache.prefixed('A', '0'));
        } finally {
            await pool.close();
        }
    });

    test('reuses an idle worker', async () => {
        const pool = new LexerPool();
        try {
            await pool.parseChunk(parent, new IdentCache());
            await pool.parseChunk(child, new IdentCache());
            expect(pool.size).toBe(1);
        } finally {
            await pool.close();
        }
    });

    test('reports grammar failures at their document position', async () => {
        const pool = new LexerPool();
        const broken: FrameChunk = { sequence: 4, kind: 'entity', text: '[Term]\nid: A:1\nbogus\n', line: 10, offset: 100 };
        try {
            const error = await rejection(pool.parseChunk(broken, new IdentCache(), 'w.obo'));
            expect(isOboException(error, 'SYNTAX_ERROR')).toBe(true);
            if (!isOboException(error)) return;
            expect(error.error.span?.line).toBe(13);
            expect(error.message).toMatch(/at w\.obo:13:1$/);
        } finally {
            await pool.close();
        }
    });

    test('refuses work once closed', async () => {
        const pool = new LexerPool();
        await pool.close();
        await expect(pool.parseChunk(parent, new IdentCache())).rejects.toThrow('Lexer pool is closed');
    });
});

describe('FrameReader', () => {
    const text = makeOntology(20);

    test('yields the header first without ordering', async () => {
        const frames = await collect(createFrameReader(text, { threads: 4, ordered: false }));
        const expected = parseString(text).entities.map(idOf);

        expect(frames[0]?.type).toBe('header');
        expect(frames.slice(1).map(idOf).sort()).toEqual([...expected].sort());
    });

    test('keeps input order when ordered', async () => {
        const frames = await collect(createFrameReader(text, { threads: 3, ordered: true, bufferPerThread: 1 }));
        expect(frames.map(idOf)).toEqual(['header', ...parseString(text).entities.map(idOf)]);
    });

    test('delivers small frames ahead of a large one without ordering', async () => {
        const large = ['[Term]', 'id: X:0000000'];
        for (let i = 1; i <= 20000; i++) {
            large.push(`is_a: X:${String(i).padStart(7, '0')}`);
        }
        const small = Array.from({ length: 8 }, (_, i) => `[Term]\nid: Y:${i + 1}\n`);
        const input = ['format-version: 1.4\n', `${large.join('\n')}\n`, ...small].join('\n');

        const seen = (await collect(createFrameReader(input, { threads: 4, ordered: false }))).map(idOf);

        expect(seen).toHaveLength(10);
        expect(seen[0]).toBe('header');
        expect(seen[1]).not.toBe('X:0000000');
        expect([...seen].sort()).toEqual(['X:0000000', 'Y:1', 'Y:2', 'Y:3', 'Y:4', 'Y:5', 'Y:6', 'Y:7', 'Y:8', 'header']);
    }, 30000);

    test('delivers every frame before a failure when ordered', async () => {
        const input = 'format-version: 1.4\n\n[Term]\nid: A:1\n\n[Term]\nid: A:2\n\n[Term]\nid: A:3\nbogus\n\n[Term]\nid: A:4\n';
        const seen: string[] = [];

        const error = await rejection(
            (async () => {
                for await (const frame of createFrameReader(input, { threads: 2, ordered: true })) {
                    seen.push(idOf(frame));
                }
            })()
        );

        expect(seen).toEqual(['header', 'A:1', 'A:2']);
        expect(isOboException(error, 'SYNTAX_ERROR')).toBe(true);
        if (!isOboException(error)) return;
        expect(error.error.span?.line).toBe(11);
    });

    test('isSequential for zero or one thread', () => {
        expect(createFrameReader(text, { threads: 0 }).isSequential).toBe(true);
        expect(createFrameReader(text, { threads: 1 }).isSequential).toBe(true);
        expect(createFrameReader(text, { threads: 2 }).isSequential).toBe(false);
    });

    test('reconfigures before iteration', () => {
        const reader = createFrameReader(text, { threads: 1, path: 'a.obo' });

        expect(reader.ordered().options).toEqual({
            threads: 1,
            ordered: true,
            bufferPerThread: 4,
            logger: noopLogger,
            path: 'a.obo',
        });
        expect(reader.withThreads(3).options.threads).toBe(3);
        expect(reader.withThreads(3).options.path).toBe('a.obo');
    });

    test('refuses to reconfigure or restart once iterated', () => {
        const reader = createFrameReader(text, { threads: 1 });
        reader[Symbol.asyncIterator]();

        expect(() => reader.ordered()).toThrow('Invalid reader options: a reader cannot be reconfigured once iteration has started');
        expect(() => reader.withThreads(2)).toThrow(/cannot be reconfigured/);
        expect(() => reader[Symbol.asyncIterator]()).toThrow('Invalid reader options: a reader can only be iterated once');
    });

    test('shares one identifier cache between frames', async () => {
        const reader = createFrameReader('[Term]\nid: A:1\nis_a: A:0\n\n[Term]\nid: A:0\n', { threads: 2, ordered: true });
        const [, first, second] = await collect(reader);

        expect(first?.type).toBe('term');
        expect(second?.type).toBe('term');
        if (first?.type !== 'term' || second?.type !== 'term') return;
        const parent = first.clauses[0]?.value;
        expect(parent?.tag).toBe('is_a');
        if (parent?.tag !== 'is_a') return;
        expect(parent.value).toBe(second.id.value);
    });
});

describe('reader logging', () => {
    const text = makeOntology(3);

    test('logs start and completion', async () => {
        const logger = recordingLogger();
        await collect(createFrameReader(text, { threads: 1, logger }));

        expect(logger.events.map((e) => e.event)).toEqual(['reader.started', 'reader.completed']);
        expect(logger.events[1]?.data).toEqual({ frames: 5 });
        expect(logger.events.map((e) => e.level)).toEqual(['debug', 'debug']);
    });

    test('logs pooled completion counts', async () => {
        const logger = recordingLogger();
        await collect(createFrameReader(text, { threads: 2, logger }));

        expect(logger.events.map((e) => e.event)).toEqual(['reader.started', 'reader.completed']);
        expect(logger.events[1]?.data).toEqual({ dispatched: 4, delivered: 4 });
    });

    test.each([1, 2])('logs cancellation on early exit with %i threads', async (threads) => {
        const logger = recordingLogger();
        for await (const frame of createFrameReader(text, { threads, logger })) {
            expect(frame.type).toBe('header');
            break;
        }
        expect(logger.events.map((e) => e.event)).toEqual(['reader.started', 'reader.cancelled']);
    });

    test('logs failures as warnings', async () => {
        const logger = recordingLogger();
        await expect(collect(createFrameReader('[Term]\nbogus\n', { threads: 1, logger }))).rejects.toThrow(
            /^Syntax error/
        );

        const failed = logger.events[1];
        expect(failed?.event).toBe('reader.failed');
        expect(failed?.level).toBe('warn');
    });
});
