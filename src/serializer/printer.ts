import type {
    CreationDate,
    Definition,
    Ident,
    IsoDate,
    IsoDateTime,
    IsoTime,
    Line,
    NaiveDateTime,
    PropertyValue,
    Qualifier,
    Synonym,
    Xref,
} from '../types/ast.js';
import type { EntityClause, EntityFrame, HeaderClause, HeaderFrame } from '../types/clauses.js';
import { escapeIdent, escapeQuoted, escapeUnquoted } from '../syntax/escape.js';
import { identToString } from '../ident/ident.js';

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

export function renderIdent(id: Ident): string {
    return identToString(id);
}

export function renderQuoted(text: string): string {
    return `"${escapeQuoted(text)}"`;
}

export function renderUnquoted(text: string): string {
    return escapeUnquoted(text);
}

export function renderXref(xref: Xref): string {
    const id = renderIdent(xref.id);
    return xref.description !== undefined ? `${id} ${renderQuoted(xref.description)}` : id;
}

export function renderXrefList(xrefs: readonly Xref[]): string {
    return `[${xrefs.map(renderXref).join(', ')}]`;
}

export function renderQualifier(qualifier: Qualifier): string {
    return `${renderIdent(qualifier.key)}=${renderQuoted(qualifier.value)}`;
}

export function renderQualifierList(qualifiers: readonly Qualifier[]): string {
    return `{${qualifiers.map(renderQualifier).join(', ')}}`;
}

export function renderDefinition(def: Definition): string {
    return `${renderQuoted(def.text)} ${renderXrefList(def.xrefs)}`;
}

export function renderSynonym(synonym: Synonym): string {
    const type = synonym.synonymType ? ` ${renderIdent(synonym.synonymType)}` : '';
    return `${renderQuoted(synonym.text)} ${synonym.scope}${type} ${renderXrefList(synonym.xrefs)}`;
}

export function renderPropertyValue(pv: PropertyValue): string {
    switch (pv.type) {
        case 'resource':
            return `${renderIdent(pv.property)} ${renderIdent(pv.target)}`;
        case 'literal':
            return `${renderIdent(pv.property)} ${renderQuoted(pv.value)} ${renderIdent(pv.datatype)}`;
    }
}

export function renderIsoDate(date: IsoDate): string {
    return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function renderIsoTime(time: IsoTime): string {
    let out = `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
    if (time.fraction !== undefined) {
        out += `.${time.fraction}`;
    }
    if (time.timezone) {
        out += time.timezone.type === 'utc'
            ? 'Z'
            : `${time.timezone.sign}${pad(time.timezone.hours)}:${pad(time.timezone.minutes)}`;
    }
    return out;
}

export function renderIsoDateTime(datetime: IsoDateTime): string {
    return `${renderIsoDate(datetime.date)}T${renderIsoTime(datetime.time)}`;
}

export function renderCreationDate(date: CreationDate): string {
    return date.type === 'date' ? renderIsoDate(date.date) : renderIsoDateTime(date.datetime);
}

export function renderNaiveDateTime(date: NaiveDateTime): string {
    return `${pad(date.day)}:${pad(date.month)}:${pad(date.year, 4)} ${pad(date.hour)}:${pad(date.minute)}`;
}

/**
 * Render a header clause as `tag: value`.
 */
export function renderHeaderClause(clause: HeaderClause): string {
    switch (clause.tag) {
        case 'format-version':
        case 'data-version':
        case 'saved-by':
        case 'auto-generated-by':
        case 'namespace-id-rule':
        case 'remark':
        case 'ontology':
        case 'owl-axioms':
            return `${clause.tag}: ${renderUnquoted(clause.value)}`;
        case 'import':
        case 'default-namespace':
            return `${clause.tag}: ${renderIdent(clause.value)}`;
        case 'default-relationship-id-prefix':
        case 'treat-xrefs-as-equivalent':
        case 'treat-xrefs-as-is_a':
        case 'treat-xrefs-as-has-subclass':
            return `${clause.tag}: ${escapeIdent(clause.prefix)}`;
        case 'treat-xrefs-as-genus-differentia':
        case 'treat-xrefs-as-reverse-genus-differentia':
            return `${clause.tag}: ${escapeIdent(clause.prefix)} ${renderIdent(clause.relation)} ${renderIdent(clause.filler)}`;
        case 'treat-xrefs-as-relationship':
            return `${clause.tag}: ${escapeIdent(clause.prefix)} ${renderIdent(clause.relation)}`;
        case 'date':
            return `${clause.tag}: ${renderNaiveDateTime(clause.value)}`;
        case 'subsetdef':
            return `${clause.tag}: ${renderIdent(clause.subset)} ${renderQuoted(clause.description)}`;
        case 'synonymtypedef': {
            const scope = clause.scope ? ` ${clause.scope}` : '';
            return `${clause.tag}: ${renderIdent(clause.synonymType)} ${renderQuoted(clause.description)}${scope}`;
        }
        case 'idspace': {
            const description = clause.description !== undefined ? ` ${renderQuoted(clause.description)}` : '';
            return `${clause.tag}: ${escapeIdent(clause.prefix)} ${renderIdent(clause.url)}${description}`;
        }
        case 'id-mapping':
            return `${clause.tag}: ${renderIdent(clause.source)} ${renderIdent(clause.target)}`;
        case 'property_value':
            return `${clause.tag}: ${renderPropertyValue(clause.value)}`;
        case 'unreserved':
            return `${clause.key}: ${renderUnquoted(clause.value)}`;
    }
}

/**
 * Render an entity clause as `tag: value`.
 */
export function renderClause(clause: EntityClause): string {
    switch (clause.tag) {
        case 'is_anonymous':
        case 'builtin':
        case 'is_anti_symmetric':
        case 'is_cyclic':
        case 'is_reflexive':
        case 'is_symmetric':
        case 'is_asymmetric':
        case 'is_transitive':
        case 'is_functional':
        case 'is_inverse_functional':
        case 'is_obsolete':
        case 'is_metadata_tag':
        case 'is_class_level':
            return `${clause.tag}: ${clause.value ? 'true' : 'false'}`;
        case 'name':
        case 'comment':
        case 'created_by':
            return `${clause.tag}: ${renderUnquoted(clause.value)}`;
        case 'namespace':
        case 'alt_id':
        case 'subset':
        case 'is_a':
        case 'union_of':
        case 'equivalent_to':
        case 'disjoint_from':
        case 'replaced_by':
        case 'consider':
        case 'domain':
        case 'range':
        case 'inverse_of':
        case 'transitive_over':
        case 'disjoint_over':
        case 'instance_of':
            return `${clause.tag}: ${renderIdent(clause.value)}`;
        case 'intersection_of':
            return 'relation' in clause && clause.relation
                ? `${clause.tag}: ${renderIdent(clause.relation)} ${renderIdent(clause.value)}`
                : `${clause.tag}: ${renderIdent(clause.value)}`;
        case 'relationship':
            return `${clause.tag}: ${renderIdent(clause.relation)} ${renderIdent(clause.value)}`;
        case 'holds_over_chain':
        case 'equivalent_to_chain':
            return `${clause.tag}: ${renderIdent(clause.first)} ${renderIdent(clause.second)}`;
        case 'expand_assertion_to':
        case 'expand_expression_to':
            return `${clause.tag}: ${renderQuoted(clause.value)} ${renderXrefList(clause.xrefs)}`;
        case 'def':
            return `${clause.tag}: ${renderDefinition(clause.value)}`;
        case 'synonym':
            return `${clause.tag}: ${renderSynonym(clause.value)}`;
        case 'xref':
            return `${clause.tag}: ${renderXref(clause.value)}`;
        case 'property_value':
            return `${clause.tag}: ${renderPropertyValue(clause.value)}`;
        case 'creation_date':
            return `${clause.tag}: ${renderCreationDate(clause.value)}`;
    }
}

/**
 * Append the qualifier block and comment of a line to its rendered value.
 */
export function renderLine<T>(line: Line<T>, renderValue: (value: T) => string): string {
    let out = renderValue(line.value);
    if (line.qualifiers) {
        out += ` ${renderQualifierList(line.qualifiers)}`;
    }
    if (line.comment !== undefined) {
        out += line.comment === '' ? ' !' : ` ! ${line.comment}`;
    }
    return out;
}

export function renderHeaderFrame(frame: HeaderFrame): string {
    return frame.clauses.map((clause) => `${renderHeaderClause(clause)}\n`).join('');
}

const FRAME_TITLES: Record<EntityFrame['type'], string> = {
    term: '[Term]',
    typedef: '[Typedef]',
    instance: '[Instance]',
};

export function renderEntityFrame(frame: EntityFrame): string {
    let out = FRAME_TITLES[frame.type];
    if (frame.comment !== undefined) {
        out += frame.comment === '' ? ' !' : ` ! ${frame.comment}`;
    }
    out += `\nid: ${renderLine(frame.id, renderIdent)}\n`;
    const lines: Line<EntityClause>[] = frame.clauses;
    for (const line of lines) {
        out += `${renderLine(line, renderClause)}\n`;
    }
    return out;
}

/**
 * Render a whole document: header clauses, then frames, separated by
 * single blank lines.
 */
export function renderDocument(header: HeaderFrame, entities: readonly EntityFrame[]): string {
    const parts: string[] = [];
    if (header.clauses.length > 0) {
        parts.push(renderHeaderFrame(header));
    }
    for (const frame of entities) {
        parts.push(renderEntityFrame(frame));
    }
    return parts.join('\n');
}
