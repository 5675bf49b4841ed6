import type { EntityFrame, HeaderFrame } from '../types/clauses.js';
import { linesOf } from '../model/frames.js';

/** Every entity frame has exactly one `name` clause. */
export function isFullyLabeled(entities: readonly EntityFrame[]): boolean {
    return entities.every((frame) => linesOf(frame).filter((l) => l.value.tag === 'name').length === 1);
}

export function isEmpty(header: HeaderFrame, entities: readonly EntityFrame[]): boolean {
    return header.clauses.length === 0 && entities.length === 0;
}
