/**
 * OBO 1.4 grammar
 *
 * PEG source compiled by peggy. Every action returns a parse tree node
 * (`Pair`); tag alternatives are generated from the clause tag groups.
 * The `lineOffset` and `charOffset` parser options shift every reported
 * position so that chunks of a larger file keep their real locations.
 */

import {
    HEADER_GENUS_TAGS,
    HEADER_IDENT_TAGS,
    HEADER_OTHER_TAGS,
    HEADER_PREFIX_TAGS,
    HEADER_TEXT_TAGS,
    INSTANCE_FLAG_TAGS,
    INSTANCE_IDENT_TAGS,
    INSTANCE_TEXT_TAGS,
    TERM_FLAG_TAGS,
    TERM_IDENT_TAGS,
    TERM_TEXT_TAGS,
    TYPEDEF_CHAIN_TAGS,
    TYPEDEF_EXPAND_TAGS,
    TYPEDEF_FLAG_TAGS,
    TYPEDEF_IDENT_TAGS,
    TYPEDEF_TEXT_TAGS,
} from '../types/tags.js';

/**
 * Tag literal alternatives producing a `Tag` node. Longest tags come
 * first so that a tag never shadows a longer one sharing its prefix.
 */
function tag(...tags: readonly string[]): string {
    const literals = [...tags]
        .sort((a, b) => b.length - a.length)
        .map((t) => JSON.stringify(t))
        .join(' / ');
    return `((${literals}) { return node('Tag'); })`;
}

const RESERVED_HEADER_TAGS = [
    ...HEADER_TEXT_TAGS,
    ...HEADER_IDENT_TAGS,
    ...HEADER_PREFIX_TAGS,
    ...HEADER_GENUS_TAGS,
    ...HEADER_OTHER_TAGS,
];

export const START_RULES = {
    OboDoc: 'ParseOboDoc',
    HeaderFrame: 'ParseHeaderFrame',
    EntityFrame: 'ParseEntityFrame',
    EntitySequence: 'ParseEntitySequence',
    Id: 'ParseId',
    QuotedString: 'ParseQuotedString',
    UnquotedString: 'ParseUnquotedString',
    XrefList: 'ParseXrefList',
    QualifierList: 'ParseQualifierList',
    Iso8601DateTime: 'ParseIso8601DateTime',
    HeaderClause: 'ParseHeaderClause',
    TermClauseLine: 'ParseTermClauseLine',
    TypedefClauseLine: 'ParseTypedefClauseLine',
    InstanceClauseLine: 'ParseInstanceClauseLine',
} as const;

export const GRAMMAR = String.raw`
{{
  function flatten(items) {
    const out = [];
    for (const item of items) {
      if (Array.isArray(item)) {
        out.push(...flatten(item));
      } else if (item !== null && typeof item === 'object') {
        out.push(item);
      }
    }
    return out;
  }
}}

{
  const lineOffset = options.lineOffset || 0;
  const charOffset = options.charOffset || 0;

  function shift(p) {
    return { offset: p.offset + charOffset, line: p.line + lineOffset, column: p.column };
  }

  function node(rule, inner) {
    const loc = location();
    return {
      rule,
      text: text(),
      span: { start: shift(loc.start), end: shift(loc.end) },
      inner: flatten(inner || []),
    };
  }
}

// --- Start rules ---

ParseOboDoc = @OboDoc EOI
ParseHeaderFrame = @HeaderFrame EOI
ParseEntityFrame = BlankLine* @EntityFrame EOI
ParseEntitySequence = @EntitySequence EOI
ParseId = @Id EOI
ParseQuotedString = @QuotedString EOI
ParseUnquotedString = @UnquotedString EOI
ParseXrefList = @XrefList EOI
ParseQualifierList = @QualifierList EOI
ParseIso8601DateTime = @Iso8601DateTime EOI
ParseHeaderClause = @HeaderClauseLine EOI
ParseTermClauseLine = @TermClauseLine EOI
ParseTypedefClauseLine = @TypedefClauseLine EOI
ParseInstanceClauseLine = @InstanceClauseLine EOI

// --- Document ---

OboDoc
  = header:HeaderFrame frames:EntityFrame* { return node('OboDoc', [header, frames]); }

HeaderFrame
  = lines:(HeaderClauseLine / BlankLine)* { return node('HeaderFrame', lines); }

HeaderClauseLine
  = WS* @HeaderClause CommentTail? EOL

EntitySequence
  = BlankLine* frames:EntityFrame* { return node('EntitySequence', frames); }

EntityFrame
  = TermFrame / TypedefFrame / InstanceFrame

TermFrame
  = WS* "[Term]" comment:CommentTail? EOL BlankLine* id:IdLine clauses:(TermClauseLine / BlankLine)*
    { return node('TermFrame', [comment, id, clauses]); }

TypedefFrame
  = WS* "[Typedef]" comment:CommentTail? EOL BlankLine* id:IdLine clauses:(TypedefClauseLine / BlankLine)*
    { return node('TypedefFrame', [comment, id, clauses]); }

InstanceFrame
  = WS* "[Instance]" comment:CommentTail? EOL BlankLine* id:IdLine clauses:(InstanceClauseLine / BlankLine)*
    { return node('InstanceFrame', [comment, id, clauses]); }

IdLine
  = WS* "id" Colon id:Id q:QualifierTail? c:CommentTail? EOL { return node('IdLine', [id, q, c]); }

TermClauseLine
  = WS* clause:TermClause q:QualifierTail? c:CommentTail? EOL { return node('TermClauseLine', [clause, q, c]); }

TypedefClauseLine
  = WS* clause:TypedefClause q:QualifierTail? c:CommentTail? EOL { return node('TypedefClauseLine', [clause, q, c]); }

InstanceClauseLine
  = WS* clause:InstanceClause q:QualifierTail? c:CommentTail? EOL { return node('InstanceClauseLine', [clause, q, c]); }

// --- Header clauses ---

HeaderClause "header clause"
  = t:${tag(...HEADER_TEXT_TAGS)} Colon v:UnquotedString { return node('HeaderClause', [t, v]); }
  / t:${tag(...HEADER_IDENT_TAGS)} Colon v:Id { return node('HeaderClause', [t, v]); }
  / t:${tag(...HEADER_PREFIX_TAGS)} Colon v:IdPrefix { return node('HeaderClause', [t, v]); }
  / t:${tag(...HEADER_GENUS_TAGS)} Colon p:IdPrefix WS+ r:Id WS+ c:Id { return node('HeaderClause', [t, p, r, c]); }
  / t:${tag('treat-xrefs-as-relationship')} Colon p:IdPrefix WS+ r:Id { return node('HeaderClause', [t, p, r]); }
  / t:${tag('date')} Colon v:NaiveDateTime { return node('HeaderClause', [t, v]); }
  / t:${tag('subsetdef')} Colon s:Id WS+ d:QuotedString { return node('HeaderClause', [t, s, d]); }
  / t:${tag('synonymtypedef')} Colon s:Id WS+ d:QuotedString sc:(WS+ @SynonymScope)?
    { return node('HeaderClause', [t, s, d, sc]); }
  / t:${tag('idspace')} Colon p:IdPrefix WS+ u:Url d:(WS+ @QuotedString)? { return node('HeaderClause', [t, p, u, d]); }
  / t:${tag('id-mapping')} Colon s:Id WS+ d:Id { return node('HeaderClause', [t, s, d]); }
  / t:${tag('property_value')} Colon v:PropertyValue { return node('HeaderClause', [t, v]); }
  / !((${RESERVED_HEADER_TAGS.map((t) => JSON.stringify(t)).join(' / ')}) ":") t:UnreservedTag Colon v:UnquotedString
    { return node('HeaderClause', [t, v]); }

UnreservedTag
  = [^ \t\r\n:!{}\[\]"]+ { return node('UnreservedTag'); }

// --- Entity clauses ---

TermClause "term clause"
  = t:${tag(...TERM_FLAG_TAGS)} Colon v:Boolean { return node('TermClause', [t, v]); }
  / t:${tag(...TERM_TEXT_TAGS)} Colon v:UnquotedString { return node('TermClause', [t, v]); }
  / t:${tag(...TERM_IDENT_TAGS)} Colon v:Id { return node('TermClause', [t, v]); }
  / t:${tag('intersection_of')} Colon r:Id WS+ c:Id { return node('TermClause', [t, r, c]); }
  / t:${tag('intersection_of')} Colon c:Id { return node('TermClause', [t, c]); }
  / t:${tag('relationship')} Colon r:Id WS+ c:Id { return node('TermClause', [t, r, c]); }
  / t:${tag('def')} Colon v:Definition { return node('TermClause', [t, v]); }
  / t:${tag('synonym')} Colon v:Synonym { return node('TermClause', [t, v]); }
  / t:${tag('xref')} Colon v:Xref { return node('TermClause', [t, v]); }
  / t:${tag('property_value')} Colon v:PropertyValue { return node('TermClause', [t, v]); }
  / t:${tag('creation_date')} Colon v:CreationDate { return node('TermClause', [t, v]); }

TypedefClause "typedef clause"
  = t:${tag(...TYPEDEF_FLAG_TAGS)} Colon v:Boolean { return node('TypedefClause', [t, v]); }
  / t:${tag(...TYPEDEF_TEXT_TAGS)} Colon v:UnquotedString { return node('TypedefClause', [t, v]); }
  / t:${tag(...TYPEDEF_IDENT_TAGS)} Colon v:Id { return node('TypedefClause', [t, v]); }
  / t:${tag(...TYPEDEF_CHAIN_TAGS, 'relationship')} Colon a:Id WS+ b:Id { return node('TypedefClause', [t, a, b]); }
  / t:${tag(...TYPEDEF_EXPAND_TAGS)} Colon q:QuotedString WS* x:XrefList { return node('TypedefClause', [t, q, x]); }
  / t:${tag('def')} Colon v:Definition { return node('TypedefClause', [t, v]); }
  / t:${tag('synonym')} Colon v:Synonym { return node('TypedefClause', [t, v]); }
  / t:${tag('xref')} Colon v:Xref { return node('TypedefClause', [t, v]); }
  / t:${tag('property_value')} Colon v:PropertyValue { return node('TypedefClause', [t, v]); }
  / t:${tag('creation_date')} Colon v:CreationDate { return node('TypedefClause', [t, v]); }

InstanceClause "instance clause"
  = t:${tag(...INSTANCE_FLAG_TAGS)} Colon v:Boolean { return node('InstanceClause', [t, v]); }
  / t:${tag(...INSTANCE_TEXT_TAGS)} Colon v:UnquotedString { return node('InstanceClause', [t, v]); }
  / t:${tag(...INSTANCE_IDENT_TAGS)} Colon v:Id { return node('InstanceClause', [t, v]); }
  / t:${tag('relationship')} Colon r:Id WS+ c:Id { return node('InstanceClause', [t, r, c]); }
  / t:${tag('def')} Colon v:Definition { return node('InstanceClause', [t, v]); }
  / t:${tag('synonym')} Colon v:Synonym { return node('InstanceClause', [t, v]); }
  / t:${tag('xref')} Colon v:Xref { return node('InstanceClause', [t, v]); }
  / t:${tag('property_value')} Colon v:PropertyValue { return node('InstanceClause', [t, v]); }
  / t:${tag('creation_date')} Colon v:CreationDate { return node('InstanceClause', [t, v]); }

// --- Clause values ---

Definition
  = t:QuotedString WS* x:XrefList { return node('Definition', [t, x]); }

Synonym
  = t:QuotedString WS+ s:SynonymScope ty:(WS+ @Id)? WS* x:XrefList { return node('Synonym', [t, s, ty, x]); }

SynonymScope "synonym scope"
  = ("EXACT" / "BROAD" / "NARROW" / "RELATED") { return node('SynonymScope'); }

PropertyValue
  = r:Id WS+ v:QuotedString WS+ d:Id { return node('LiteralPropertyValue', [r, v, d]); }
  / r:Id WS+ v:UnquotedLiteral WS+ d:Id { return node('LiteralPropertyValue', [r, v, d]); }
  / r:Id WS+ v:Id { return node('ResourcePropertyValue', [r, v]); }

UnquotedLiteral
  = IdChar+ { return node('UnquotedLiteral'); }

Xref "xref"
  = id:Id d:(WS+ @QuotedString)? { return node('Xref', [id, d]); }

XrefList "xref list"
  = "[" WS* xs:(h:Xref t:(WS* "," WS* @Xref)* { return [h, t]; })? WS* "]" { return node('XrefList', [xs]); }

QualifierList "qualifier list"
  = "{" WS* qs:(h:Qualifier t:(WS* "," WS* @Qualifier)* { return [h, t]; })? WS* "}" { return node('QualifierList', [qs]); }

Qualifier
  = k:QualifierKey WS* "=" WS* v:QuotedString { return node('Qualifier', [k, v]); }

QualifierKey
  = ("\\" [^\r\n] / [^ \t\r\n\f"\[\]{},=!\\])+ { return node('QualifierKey'); }

Boolean "boolean"
  = ("true" / "false") { return node('Boolean'); }

// --- Identifiers ---

Id "identifier"
  = Url / PrefixedId / UnprefixedId

Url
  = [a-zA-Z] [a-zA-Z0-9+.\-]* "://" UrlChar+ { return node('Url'); }

PrefixedId
  = p:IdPrefix ":" l:IdLocal { return node('PrefixedId', [p, l]); }

UnprefixedId
  = IdPrefixChar+ { return node('UnprefixedId'); }

IdPrefix
  = IdPrefixChar+ { return node('IdPrefix'); }

IdLocal
  = IdChar* { return node('IdLocal'); }

IdPrefixChar
  = "\\" [^\r\n] / [^ \t\r\n\f"\[\]{},:!\\]

IdChar
  = "\\" [^\r\n] / [^ \t\r\n\f"\[\]{},!\\]

UrlChar
  = "\\" [^\r\n] / [^ \t\r\n\f"\[\]{},\\]

// --- Strings ---

QuotedString "quoted string"
  = '"' ("\\" [^\r\n] / [^"\\\r\n])* '"' { return node('QuotedString'); }

UnquotedString "unquoted string"
  = UChar+ (WS+ UChar+)* { return node('UnquotedString'); }

UChar
  = "\\" [^\r\n] / [^ \t\r\n\\!{}]

// --- Dates ---

CreationDate
  = Iso8601DateTime / Iso8601Date

Iso8601DateTime
  = d:Iso8601Date "T" t:Iso8601Time { return node('IsoDateTime', [d, t]); }

Iso8601Date
  = Digit Digit Digit Digit "-" Digit Digit "-" Digit Digit { return node('IsoDate'); }

Iso8601Time
  = Digit Digit ":" Digit Digit ":" Digit Digit ("." Digit+)? Timezone? { return node('IsoTime'); }

Timezone
  = "Z" / [+\-] Digit Digit (":"? Digit Digit)?

NaiveDateTime
  = Digit Digit ":" Digit Digit ":" Digit Digit Digit Digit WS+ Digit Digit ":" Digit Digit
    { return node('NaiveDateTime'); }

Digit
  = [0-9]

// --- Layout ---

QualifierTail
  = WS* @QualifierList

CommentTail
  = WS* @Comment

Comment
  = "!" [^\r\n]* { return node('Comment'); }

BlankLine
  = WS* Comment? NL { return null; }
  / WS+ Comment? EOI { return null; }
  / Comment EOI { return null; }

Colon
  = ":" WS*

EOL
  = WS* (NL / EOI)

WS "whitespace"
  = [ \t]

NL "newline"
  = "\r\n" / "\n"

EOI "end of input"
  = !.
`;
