/**
 * OBO Value Types
 *
 * Identifiers and the small value objects that clause values are made of.
 * Every value is a plain object; identifiers coming out of the parser are
 * frozen and shared through the session's IdentCache.
 */

export interface PrefixedIdent {
    readonly type: 'prefixed';
    readonly prefix: string;
    readonly local: string;
}

export interface UnprefixedIdent {
    readonly type: 'unprefixed';
    readonly value: string;
}

export interface Url {
    readonly type: 'url';
    readonly value: string;
}

export type Ident = PrefixedIdent | UnprefixedIdent | Url;

/** `key="value"` entry of a trailing qualifier block. */
export interface Qualifier {
    readonly key: Ident;
    readonly value: string;
}

export interface Xref {
    readonly id: Ident;
    readonly description?: string;
}

export type SynonymScope = 'EXACT' | 'BROAD' | 'NARROW' | 'RELATED';

export interface Synonym {
    readonly text: string;
    readonly scope: SynonymScope;
    readonly synonymType?: Ident;
    readonly xrefs: readonly Xref[];
}

export interface Definition {
    readonly text: string;
    readonly xrefs: readonly Xref[];
}

/** `property_value: rel target` */
export interface ResourcePropertyValue {
    readonly type: 'resource';
    readonly property: Ident;
    readonly target: Ident;
}

/** `property_value: rel "value" xsd:string` */
export interface LiteralPropertyValue {
    readonly type: 'literal';
    readonly property: Ident;
    readonly value: string;
    readonly datatype: Ident;
}

export type PropertyValue = ResourcePropertyValue | LiteralPropertyValue;

export interface IsoDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;
}

export type IsoTimezone =
    | { readonly type: 'utc' }
    | { readonly type: 'offset'; readonly sign: '+' | '-'; readonly hours: number; readonly minutes: number };

export interface IsoTime {
    readonly hour: number;
    readonly minute: number;
    readonly second: number;
    /** Digits after the decimal point, kept verbatim. */
    readonly fraction?: string;
    readonly timezone?: IsoTimezone;
}

export interface IsoDateTime {
    readonly date: IsoDate;
    readonly time: IsoTime;
}

export type CreationDate =
    | { readonly type: 'date'; readonly date: IsoDate }
    | { readonly type: 'datetime'; readonly datetime: IsoDateTime };

/** Header `date` value, written `dd:MM:yyyy HH:mm`. */
export interface NaiveDateTime {
    readonly day: number;
    readonly month: number;
    readonly year: number;
    readonly hour: number;
    readonly minute: number;
}

/**
 * A clause together with its optional trailing qualifiers and comment.
 * Absent parts are omitted rather than set to undefined.
 */
export interface Line<T> {
    readonly value: T;
    readonly qualifiers?: readonly Qualifier[];
    readonly comment?: string;
}
