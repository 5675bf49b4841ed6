import type { Frame } from '../types/clauses.js';
import type { Pair, SourceOffsets, StartRule } from '../types/parser.js';
import { attachPath } from '../types/errors.js';
import type { IdentCache } from '../ident/cache.js';
import { Lexer } from '../syntax/lexer.js';
import { buildEntityFrame, buildHeaderFrame } from '../builder/frames.js';
import type { FrameChunk } from './splitter.js';

export function chunkRule(chunk: FrameChunk): StartRule {
    return chunk.kind === 'header' ? 'HeaderFrame' : 'EntityFrame';
}

/** Where the chunk sits in the whole input. */
export function chunkOffsets(chunk: FrameChunk, path?: string): SourceOffsets {
    return { line: chunk.line, offset: chunk.offset, ...(path !== undefined && { path }) };
}

/**
 * Build the frame of a tokenized chunk, interning its identifiers in
 * `cache`.
 */
export function buildChunk(chunk: FrameChunk, pair: Pair, cache: IdentCache, path?: string): Frame {
    try {
        return chunk.kind === 'header' ? buildHeaderFrame(pair, cache) : buildEntityFrame(pair, cache);
    } catch (error) {
        throw attachPath(error, path);
    }
}

/**
 * Tokenize and build one chunk, reporting positions relative to the whole
 * input.
 * @throws OboException with code SYNTAX_ERROR
 */
export function parseChunk(chunk: FrameChunk, cache: IdentCache, path?: string): Frame {
    let pair: Pair;
    try {
        pair = Lexer.tokenize(chunkRule(chunk), chunk.text, chunkOffsets(chunk, path));
    } catch (error) {
        throw attachPath(error, path);
    }
    return buildChunk(chunk, pair, cache, path);
}
