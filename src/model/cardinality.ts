/**
 * Cardinality validation
 *
 * Tally clause tags per frame and compare each tally with the tag's
 * declared cardinality. Validation is explicit: nothing here runs while
 * a frame is being built.
 */

import type { Frame } from '../types/clauses.js';
import { createCardinalityError, type CardinalityKind } from '../types/errors.js';
import { frameLocation } from './locations.js';
import { frameIdOf } from './frames.js';
import {
    HEADER_CLAUSES,
    HEADER_TAGS,
    INSTANCE_CLAUSES,
    INSTANCE_TAGS,
    TERM_CLAUSES,
    TERM_TAGS,
    TYPEDEF_CLAUSES,
    TYPEDEF_TAGS,
    checkCount,
    type ClauseTable,
} from './tables.js';

export interface CardinalityViolation {
    tag: string;
    kind: CardinalityKind;
    /** Rendered frame identifier; absent for the header frame. */
    frameId?: string;
}

/**
 * Violations in order: duplicates and singles in order of first
 * occurrence, then missing required tags in table order.
 */
function tally<Tag extends string>(
    tags: readonly Tag[],
    table: ClauseTable<Tag>,
    order: readonly Tag[]
): Array<{ tag: string; kind: CardinalityKind }> {
    const counts = new Map<string, number>();
    for (const tag of tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }

    const found: Array<{ tag: string; kind: CardinalityKind }> = [];
    for (const tag of new Set(tags)) {
        const kind = checkCount(table[tag].cardinality, counts.get(tag) ?? 0);
        if (kind) {
            found.push({ tag, kind });
        }
    }
    for (const tag of order) {
        if (!counts.has(tag) && checkCount(table[tag].cardinality, 0) === 'missing') {
            found.push({ tag, kind: 'missing' });
        }
    }
    return found;
}

/**
 * Every cardinality violation of a frame.
 */
export function checkFrame(frame: Frame): CardinalityViolation[] {
    switch (frame.type) {
        case 'header':
            return tally(frame.clauses.map((c) => c.tag), HEADER_CLAUSES, HEADER_TAGS);
        case 'term':
            return tally(frame.clauses.map((l) => l.value.tag), TERM_CLAUSES, TERM_TAGS)
                .map((v) => ({ ...v, frameId: frameIdOf(frame) }));
        case 'typedef':
            return tally(frame.clauses.map((l) => l.value.tag), TYPEDEF_CLAUSES, TYPEDEF_TAGS)
                .map((v) => ({ ...v, frameId: frameIdOf(frame) }));
        case 'instance':
            return tally(frame.clauses.map((l) => l.value.tag), INSTANCE_CLAUSES, INSTANCE_TAGS)
                .map((v) => ({ ...v, frameId: frameIdOf(frame) }));
    }
}

/**
 * Throw the first cardinality violation of a frame.
 * @throws OboException with code CARDINALITY_ERROR
 */
export function validateFrame(frame: Frame): void {
    const [first] = checkFrame(frame);
    if (first) {
        throw createCardinalityError(first.tag, first.kind, first.frameId, frameLocation(frame));
    }
}
