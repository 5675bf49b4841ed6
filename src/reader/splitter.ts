/**
 * Frame splitter
 *
 * Sequential producer for the frame readers: decodes the input stream and
 * cuts it into one chunk for the header and one chunk per entity frame.
 * A new frame starts at every line whose first non-blank character is
 * `[`, so a bad frame header still ends up in a chunk of its own and is
 * reported by the grammar.
 */

import { StringDecoder } from 'string_decoder';

export interface FrameChunk {
    /** 0 for the header, then 1, 2, ... per entity frame. */
    sequence: number;
    kind: 'header' | 'entity';
    text: string;
    /** Lines before the chunk. */
    line: number;
    /** Characters before the chunk. */
    offset: number;
}

export type FrameSource = string | AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

function isFrameStart(line: string): boolean {
    return line.trimStart().startsWith('[');
}

function countLines(text: string): number {
    let count = 0;
    for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
        count++;
    }
    return count;
}

export class FrameSplitter implements AsyncIterable<FrameChunk> {
    constructor(private readonly source: FrameSource) {}

    async *[Symbol.asyncIterator](): AsyncGenerator<FrameChunk, void, undefined> {
        const decoder = new StringDecoder('utf8');
        let pending = '';
        let current: string[] = [];
        let sequence = 0;
        let line = 0;
        let offset = 0;

        const cut = (): FrameChunk => {
            const text = current.join('');
            const chunk: FrameChunk = { sequence, kind: sequence === 0 ? 'header' : 'entity', text, line, offset };
            sequence++;
            line += countLines(text);
            offset += text.length;
            current = [];
            return chunk;
        };

        const source = typeof this.source === 'string' ? [this.source] : this.source;
        for await (const data of source) {
            pending += typeof data === 'string' ? data : decoder.write(data);
            let start = 0;
            for (let newline = pending.indexOf('\n'); newline !== -1; newline = pending.indexOf('\n', start)) {
                const complete = pending.slice(start, newline + 1);
                start = newline + 1;
                if (isFrameStart(complete)) {
                    yield cut();
                }
                current.push(complete);
            }
            pending = pending.slice(start);
        }

        pending += decoder.end();
        if (pending !== '') {
            if (isFrameStart(pending)) {
                yield cut();
            }
            current.push(pending);
        }
        yield cut();
    }
}
