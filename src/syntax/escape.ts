/**
 * Backslash escapes shared by the builder and the serializer.
 */

const UNESCAPES: Record<string, string> = {
    n: '\n',
    r: '\r',
    t: '\t',
    f: '\f',
};

/**
 * Resolve backslash escapes: `\n`, `\r`, `\t`, `\f` map to control
 * characters, any other escaped character stands for itself.
 */
export function unescape(text: string): string {
    if (!text.includes('\\')) {
        return text;
    }
    let out = '';
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === '\\' && i + 1 < text.length) {
            const next = text[++i];
            out += UNESCAPES[next] ?? next;
        } else {
            out += ch;
        }
    }
    return out;
}

function escapeWith(text: string, pattern: RegExp): string {
    return text.replace(pattern, (ch) => {
        switch (ch) {
            case '\n':
                return '\\n';
            case '\r':
                return '\\r';
            case '\t':
                return '\\t';
            case '\f':
                return '\\f';
            default:
                return `\\${ch}`;
        }
    });
}

/** Escape the contents of a quoted string (without the quotes). */
export function escapeQuoted(text: string): string {
    return escapeWith(text, /["\\\n\r\f]/g);
}

/**
 * Escape an unquoted clause value. Leading and trailing blanks are
 * escaped too, since the grammar trims them.
 */
export function escapeUnquoted(text: string): string {
    const escaped = escapeWith(text, /[!{}"\\\n\r\f]/g);
    return escaped.replace(/^[ \t]|[ \t]$/g, (ch) => (ch === '\t' ? '\\t' : '\\ '));
}

/** Escape an identifier component (prefix, local part or unprefixed id). */
export function escapeIdent(text: string): string {
    return escapeWith(text, /[ \t:"\\,[\]{}!\n\r\f]/g);
}

/** Escape the characters a URL cannot carry verbatim. */
export function escapeUrl(text: string): string {
    return escapeWith(text, /[ \t"\\,[\]{}\n\r\f]/g);
}
