import { Level, LevelDefault, LevelMask } from './types';
import type { EmitLevel, LevelName, LevelTags } from './types';

/* ---------------------------------- Types ---------------------------------- */

/**
 * Current gate setting of a logger: an ordered threshold or a bitmask of levels.
 */
export type Severity =
    | { kind: 'threshold'; level: Level }
    | { kind: 'mask'; mask: number };

/* -------------------------------- Constants -------------------------------- */

/** All levels a call can be made at, most severe first. */
export const EMIT_LEVELS: readonly EmitLevel[] = [
    Level.Fatal, Level.Panic, Level.Error, Level.Warning, Level.Info, Level.Debug,
];

export const LEVEL_NAMES: Readonly<Record<EmitLevel, LevelName>> = {
    [Level.Fatal]:   'fatal',
    [Level.Panic]:   'panic',
    [Level.Error]:   'error',
    [Level.Warning]: 'warning',
    [Level.Info]:    'info',
    [Level.Debug]:   'debug',
};

/** Plain channel prefixes; all seven characters wide. */
export const LEVEL_TAGS: LevelTags = {
    [Level.Fatal]:   'FATAL: ',
    [Level.Panic]:   'PANIC: ',
    [Level.Error]:   'ERROR: ',
    [Level.Warning]: 'WARN : ',
    [Level.Info]:    'INFO : ',
    [Level.Debug]:   'DEBUG: ',
};

/** Same tags with `fn` applied to each. */
export function mapTags(tags: LevelTags, fn: (tag: string, level: EmitLevel) => string): LevelTags {
    return {
        [Level.Fatal]:   fn(tags[Level.Fatal], Level.Fatal),
        [Level.Panic]:   fn(tags[Level.Panic], Level.Panic),
        [Level.Error]:   fn(tags[Level.Error], Level.Error),
        [Level.Warning]: fn(tags[Level.Warning], Level.Warning),
        [Level.Info]:    fn(tags[Level.Info], Level.Info),
        [Level.Debug]:   fn(tags[Level.Debug], Level.Debug),
    };
}

/* ---------------------------------- Gates ---------------------------------- */

/** Ordered gate: a call passes when it is at least as severe as the threshold. */
export function enabled(threshold: Level, level: EmitLevel): boolean {
    return threshold >= level;
}

export function levelBit(level: EmitLevel): number {
    return 1 << level;
}

/** Bitmask gate: a call passes when its level bit is set. */
export function maskEnabled(mask: number, level: EmitLevel): boolean {
    return (mask & levelBit(level)) !== 0;
}

export function isEnabled(severity: Severity, level: EmitLevel): boolean {
    return severity.kind === 'threshold'
        ? enabled(severity.level, level)
        : maskEnabled(severity.mask, level);
}

/** Mask equivalent of an ordered threshold. */
export function thresholdMask(threshold: Level): number {
    let mask: number = LevelMask.None;
    for (const level of EMIT_LEVELS) if (enabled(threshold, level)) mask |= levelBit(level);
    return mask;
}

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Resolve a string into a `Level`.
 * Accepts level names (case-insensitive, `warn` for `warning`, `off`/`none`)
 * or an integer between -1 and 5.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseLevel(s?: string): Level | undefined {
    if (!s) return undefined;
    switch (s.trim().toLowerCase())
    {
        case 'off':
        case 'none': return Level.Off;
        case 'fatal': return Level.Fatal;
        case 'panic': return Level.Panic;
        case 'error': return Level.Error;
        case 'warn':
        case 'warning': return Level.Warning;
        case 'info': return Level.Info;
        case 'debug': return Level.Debug;
    }
    const n = Number(s);
    if (!Number.isInteger(n)) return undefined;
    return EMIT_LEVELS.find((level) => level === n) ?? (n < Level.Fatal ? Level.Off : Level.Debug);
}

/**
 * Resolve the threshold in the following order:
 * 1) Explicit `level`
 * 2) `DEBUG_MODE=1|true|yes|on` → Debug
 * 3) `LOG_LEVEL=<name|number>`
 * 4) `NODE_ENV=production` → `prodDefault` when given, else `LevelDefault`
 */
export function resolveLevel(
    explicit: Level | null | undefined,
    env?: Record<string, string | undefined>,
    prodDefault?: Level,
): Level {
    if (explicit != null) return explicit;

    const dm = env?.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return Level.Debug;

    const level = parseLevel(env?.LOG_LEVEL);
    if (level != null) return level;

    return env?.NODE_ENV?.trim().toLowerCase() === 'production' ? (prodDefault ?? LevelDefault) : LevelDefault;
}
