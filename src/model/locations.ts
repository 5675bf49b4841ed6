/**
 * Source locations of parsed frames, kept beside the AST so that frames
 * stay plain values and compare structurally.
 */

import type { Frame } from '../types/clauses.js';
import type { ErrorSpan } from '../types/errors.js';

const locations = new WeakMap<Frame, ErrorSpan>();

export function setFrameLocation(frame: Frame, span: ErrorSpan): void {
    locations.set(frame, span);
}

export function frameLocation(frame: Frame): ErrorSpan | undefined {
    return locations.get(frame);
}
