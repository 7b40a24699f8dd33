import type { Fields } from './types';
import { formatValue, safeJson } from './utils';

export const EMPTY_FIELDS: Fields = Object.freeze({});

/** Keys serialized first in JSON output, in this order. */
const RESERVED_KEYS = ['time', 'level', 'msg'] as const;

function isEmpty(fields: Fields): boolean {
    for (const _ in fields) return false;
    return true;
}

/**
 * Union of two field sets; `additional` wins on key collision.
 * An empty operand returns the other one as is; otherwise a new object.
 */
export function mergeFields(base: Fields, additional: Fields): Fields {
    if (isEmpty(base)) return additional;
    if (isEmpty(additional)) return base;
    return { ...base, ...additional };
}

/**
 * `key=value ` pairs sorted by key, each followed by a space.
 * Values containing whitespace are wrapped in double quotes.
 */
export function renderFields(fields: Fields): string {
    let out = '';
    for (const key of Object.keys(fields).sort()) {
        let value = formatValue(fields[key]);
        if (/\s/.test(value)) value = `"${value}"`;
        out += `${key}=${value} `;
    }
    return out;
}

/**
 * JSON object text with `time`, `level` and `msg` first (when present),
 * then the remaining keys in insertion order.
 */
export function stringifyFields(fields: Fields): string {
    const pairs: string[] = [];
    const pair = (key: string) => `${JSON.stringify(key)}:${safeJson(fields[key])}`;
    for (const key of RESERVED_KEYS) if (Object.hasOwn(fields, key)) pairs.push(pair(key));
    for (const key of Object.keys(fields)) {
        if (key === 'time' || key === 'level' || key === 'msg') continue;
        pairs.push(pair(key));
    }
    return `{${pairs.join(',')}}`;
}

// key=value or key="value with spaces", then a space or the end
const FIELD_TOKEN = /^([^\s="]+)=(?:"(.*?)"|(\S*))(?: |$)/;

/**
 * Split a plain-text line back into its leading fields and the message.
 * Field values come back as the strings they were rendered to.
 */
export function parseFields(line: string): { fields: Record<string, string>; message: string } {
    const fields: Record<string, string> = {};
    let rest = line.endsWith('\n') ? line.slice(0, -1) : line;
    for (let m = FIELD_TOKEN.exec(rest); m; m = FIELD_TOKEN.exec(rest)) {
        fields[m[1]] = m[2] ?? m[3];
        rest = rest.slice(m[0].length);
        if (!rest) break;
    }
    return { fields, message: rest };
}
