/**
 * OBO Parser
 *
 * Whole-document entry points. `parseString` runs the document grammar in
 * one pass; `parseReader` and `parseFile` go through the frame reader and
 * keep the input order of frames.
 */

import * as fs from 'fs';
import * as zlib from 'zlib';
import type { Readable } from 'stream';
import type { EntityFrame, HeaderFrame } from './types/clauses.js';
import { attachPath, createIoError, isOboException } from './types/errors.js';
import type { ReaderOptions } from './types/options.js';
import { IdentCache } from './ident/cache.js';
import { Lexer } from './syntax/lexer.js';
import { buildOboDoc } from './builder/frames.js';
import { createFrameReader } from './reader/index.js';
import type { FrameSource } from './reader/splitter.js';
import { OboDoc } from './doc.js';

export interface ParseOptions {
    /** Source file, reported in syntax errors. */
    path?: string;
    /** Session cache; a fresh one is used when omitted. */
    cache?: IdentCache;
}

/**
 * Parse a complete OBO document held in memory.
 * @throws OboException with code SYNTAX_ERROR
 */
export function parseString(text: string, options: ParseOptions = {}): OboDoc {
    const { path, cache = new IdentCache() } = options;
    try {
        return buildOboDoc(Lexer.tokenize('OboDoc', text, { path }), cache);
    } catch (error) {
        throw attachPath(error, path);
    }
}

/**
 * Parse a document from a stream of text or bytes.
 * @throws OboException with code SYNTAX_ERROR, or IO_ERROR when the stream fails
 */
export async function parseReader(input: FrameSource, options: ReaderOptions = {}): Promise<OboDoc> {
    const reader = createFrameReader(input, { ...options, ordered: true });
    let header: HeaderFrame = { type: 'header', clauses: [] };
    const entities: EntityFrame[] = [];
    try {
        for await (const frame of reader) {
            if (frame.type === 'header') {
                header = frame;
            } else {
                entities.push(frame);
            }
        }
    } catch (error) {
        if (isOboException(error)) {
            throw error;
        }
        throw createIoError(error, options.path);
    }
    return new OboDoc(header, entities);
}

/**
 * Open a file for reading, gunzipping it when the name ends in `.gz`.
 */
export function openObo(path: string): Readable {
    const file = fs.createReadStream(path);
    if (!path.endsWith('.gz')) {
        return file;
    }
    const gunzip = zlib.createGunzip();
    file.on('error', (error) => gunzip.destroy(error));
    return file.pipe(gunzip);
}

/**
 * Parse an OBO file. Syntax errors name the file.
 * @throws OboException with code SYNTAX_ERROR, or IO_ERROR when the file cannot be read
 */
export async function parseFile(path: string, options: ReaderOptions = {}): Promise<OboDoc> {
    return parseReader(openObo(path), { ...options, path });
}
