import { basename } from 'node:path';
import { fileURLToPath } from 'node:url';
import { format } from 'node:util';
import { Flags } from './types';

/* ------------------------------ Error helpers ------------------------------ */

/** Fast-ish error-like detection */
export function isErrorLike(e: unknown): e is Error {
    return e instanceof Error
        || (!!e && typeof e === 'object' && typeof Reflect.get(e, 'message') === 'string');
}

/**
 * Convert an Error into a small, JSON-friendly object.
 * - Always includes `name` and `message`.
 * - Copies own enumerable custom fields (if any) but never overrides `name|message|stack`.
 */
export function normalizeError(err: Error): Record<string, unknown> {
    const out: Record<string, unknown> = { name: err.name || 'Error', message: err.message };
    for (const k of Object.keys(err)) {
        if (k === 'name' || k === 'message' || k === 'stack') continue;
        out[k] = Reflect.get(err, k);
    }
    return out;
}

export function describeError(err: unknown): string {
    return isErrorLike(err) ? err.message : formatValue(err);
}

/* ----------------------------- Format helpers ------------------------------ */

/** JSON text of any value; never throws, `null` for values JSON cannot hold. */
export function safeJson(data: unknown): string {
    const seen = new WeakSet<object>();
    try {
        const out: string | undefined = JSON.stringify(data, (_k, v: unknown) => {
            if (typeof v === 'bigint') return v.toString();
            if (v instanceof Error) return normalizeError(v);
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
        return out ?? 'null';
    } catch {
        try { return JSON.stringify(String(data)); } catch { return '"[Unserializable]"'; }
    }
}

/** An object with its own idea of `toString` (Date, URL, class instances...). */
function isStringer(v: object): boolean {
    const fn: unknown = Reflect.get(v, 'toString');
    return typeof fn === 'function' && fn !== Object.prototype.toString && fn !== Array.prototype.toString;
}

/**
 * Text form of a single value, as used for field values and message operands.
 * Strings pass through, errors render their message, stringers their `toString()`,
 * other objects their JSON.
 */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null || typeof value !== 'object') return String(value);
    if (isErrorLike(value)) return value.message;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    if (isStringer(value)) return String(value);
    return safeJson(value);
}

/** Print-style message: operands joined by a single space. */
export function sprint(args: readonly unknown[]): string {
    return args.map(formatValue).join(' ');
}

/** Printf-style message (`%s`, `%d`, `%j`, `%o`...). */
export function sprintf(fmt: string, args: readonly unknown[]): string {
    return format(fmt, ...args);
}

/* ------------------------------- Time helpers ------------------------------ */

function pad(n: number, width: number): string {
    return String(n).padStart(width, '0');
}

/**
 * Date and time text per `flags`: `YYYY/MM/DD`, `HH:MM:SS`, `HH:MM:SS.uuuuuu`,
 * joined by a space. Empty when no date/time flag is set.
 */
export function formatTime(ms: number, flags: number): string {
    if ((flags & (Flags.Date | Flags.Time | Flags.Microseconds)) === 0) return '';
    const t = new Date(Math.floor(ms));
    const utc = (flags & Flags.UTC) !== 0;
    const parts: string[] = [];
    if (flags & Flags.Date) {
        const year = utc ? t.getUTCFullYear() : t.getFullYear();
        const month = (utc ? t.getUTCMonth() : t.getMonth()) + 1;
        const day = utc ? t.getUTCDate() : t.getDate();
        parts.push(`${pad(year, 4)}/${pad(month, 2)}/${pad(day, 2)}`);
    }
    if (flags & (Flags.Time | Flags.Microseconds)) {
        const hour = utc ? t.getUTCHours() : t.getHours();
        const min = utc ? t.getUTCMinutes() : t.getMinutes();
        const sec = utc ? t.getUTCSeconds() : t.getSeconds();
        let clock = `${pad(hour, 2)}:${pad(min, 2)}:${pad(sec, 2)}`;
        if (flags & Flags.Microseconds) {
            const micros = Math.min(999_999, Math.round((ms - Math.floor(ms / 1000) * 1000) * 1000));
            clock += `.${pad(micros, 6)}`;
        }
        parts.push(clock);
    }
    return parts.join(' ');
}

/** Wall clock with sub-millisecond resolution. */
export function defaultClock(): number {
    return performance.timeOrigin + performance.now();
}

/* ------------------------------ Caller lookup ------------------------------ */

export type CallerLocation = { file: string; line: number };

const UNKNOWN_CALLER: CallerLocation = { file: '???', line: 0 };

// "    at fn (/a/b.ts:1:2)" or "    at /a/b.ts:1:2"
const FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Source location `skip` frames above the function calling this one
 * (0 is that function itself). Unknown frames give `???:0`.
 */
export function callerLocation(skip: number): CallerLocation {
    const limit = Error.stackTraceLimit;
    Error.stackTraceLimit = skip + 2;
    const stack = new Error().stack;
    Error.stackTraceLimit = limit;

    // [0] is the "Error" header, [1] this function.
    const frame = stack?.split('\n')[skip + 2];
    const m = frame ? FRAME.exec(frame) : null;
    if (!m) return UNKNOWN_CALLER;
    const file = m[1].startsWith('file://') ? fileURLToPath(m[1]) : m[1];
    return { file, line: Number(m[2]) };
}

/** `file:line` per flags; ShortFile keeps only the final path element. */
export function formatLocation(location: CallerLocation, flags: number): string {
    const file = flags & Flags.ShortFile ? basename(location.file) : location.file;
    return `${file}:${location.line}`;
}
