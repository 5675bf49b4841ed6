/**
 * OBO Document
 *
 * The whole-document aggregate: a header frame followed by entity frames
 * in insertion order until `sort()` canonicalizes them.
 */

import { once } from 'events';
import { isDeepStrictEqual } from 'util';
import type { Writable } from 'stream';
import type { EntityFrame, HeaderFrame } from './types/clauses.js';
import { checkFrame, validateFrame, type CardinalityViolation } from './model/cardinality.js';
import { renderDocument, renderEntityFrame, renderHeaderFrame } from './serializer/printer.js';
import { isDocumentSorted, sortDocument } from './semantics/sort.js';
import { assignNamespaces } from './semantics/namespaces.js';
import { mergeOwlAxioms } from './semantics/owlAxioms.js';
import { treatXrefs } from './semantics/treatXrefs.js';
import { isEmpty, isFullyLabeled } from './semantics/labels.js';

export class OboDoc {
    constructor(
        public header: HeaderFrame = { type: 'header', clauses: [] },
        public entities: EntityFrame[] = []
    ) {}

    /** Canonical order. Idempotent. */
    sort(): this {
        sortDocument(this.header, this.entities);
        return this;
    }

    isSorted(): boolean {
        return isDocumentSorted(this.header, this.entities);
    }

    /**
     * Add the default namespace to every frame that lacks one.
     * @throws OboException with code CARDINALITY_ERROR
     */
    assignNamespaces(): this {
        assignNamespaces(this.header, this.entities);
        return this;
    }

    mergeOwlAxioms(): this {
        mergeOwlAxioms(this.header);
        return this;
    }

    /** Expand the `treat-xrefs-as-*` header macros. Idempotent. */
    treatXrefs(): this {
        treatXrefs(this.header, this.entities);
        return this;
    }

    isFullyLabeled(): boolean {
        return isFullyLabeled(this.entities);
    }

    isEmpty(): boolean {
        return isEmpty(this.header, this.entities);
    }

    /**
     * Check the cardinality of the header and every entity frame.
     * @throws OboException with code CARDINALITY_ERROR for the first violation
     */
    validate(): void {
        validateFrame(this.header);
        for (const frame of this.entities) {
            validateFrame(frame);
        }
    }

    /** Every cardinality violation in the document, header first. */
    violations(): CardinalityViolation[] {
        return [this.header, ...this.entities].flatMap((frame) => checkFrame(frame));
    }

    equals(other: OboDoc): boolean {
        return isDeepStrictEqual(this.header, other.header) && isDeepStrictEqual(this.entities, other.entities);
    }

    toString(): string {
        return renderDocument(this.header, this.entities);
    }

    /**
     * Write the document frame by frame, waiting for `drain` whenever the
     * stream buffer is full.
     */
    async toWriter(stream: Writable): Promise<void> {
        let first = true;
        const write = async (chunk: string): Promise<void> => {
            const text = first ? chunk : `\n${chunk}`;
            first = false;
            if (!stream.write(text)) {
                await once(stream, 'drain');
            }
        };
        if (this.header.clauses.length > 0) {
            await write(renderHeaderFrame(this.header));
        }
        for (const frame of this.entities) {
            await write(renderEntityFrame(frame));
        }
    }
}
