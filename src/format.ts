import { mergeFields, renderFields, stringifyFields } from './fields';
import { LEVEL_TAGS, mapTags } from './levels';
import { Flags, Level } from './types';
import type { EmitLevel, Fields, FormatInput, Formatter, LevelTags } from './types';
import { callerLocation, formatLocation, formatTime } from './utils';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode = 'auto' | 'on' | 'off';

/** Frames between a formatter's `output` and the user's call: output ← Logger.log ← Logger.info ← caller. */
export const CALLER_DEPTH = 3;

const CSI = '\x1b[';
const RESET = `${CSI}0m`;
const colors = {
    red:    (s: string) => `${CSI}31m${s}${RESET}`,
    yellow: (s: string) => `${CSI}33m${s}${RESET}`,
    cyan:   (s: string) => `${CSI}36m${s}${RESET}`,
    white:  (s: string) => `${CSI}37m${s}${RESET}`,
};

const levelColor: Readonly<Record<EmitLevel, (s: string) => string>> = {
    [Level.Fatal]:   colors.red,
    [Level.Panic]:   colors.red,
    [Level.Error]:   colors.red,
    [Level.Warning]: colors.yellow,
    [Level.Info]:    colors.cyan,
    [Level.Debug]:   colors.white,
};

const EMPTY_TAGS: LevelTags = mapTags(LEVEL_TAGS, () => '');

/* ------------------------------- Formatters -------------------------------- */

/**
 * `key=value` fields followed by the message. Time, location and level tag
 * are left to the channel.
 */
export class PlainFormatter implements Formatter {
    output(input: FormatInput): string {
        return renderFields(input.fields) + input.message;
    }

    flags(): number | undefined {
        return undefined;
    }

    prefixes(): LevelTags | undefined {
        return undefined;
    }
}

/**
 * One JSON object per line: `time`, `level`, `msg`, then the fields and `file`.
 * Channels get no flags and no prefixes since the object carries all of it.
 */
export class JsonFormatter implements Formatter {
    output(input: FormatInput): string {
        const { flags } = input;
        const header: Record<string, unknown> = {};

        if (flags & (Flags.LongFile | Flags.ShortFile)) {
            header.file = formatLocation(callerLocation(CALLER_DEPTH + input.depth), flags);
        }
        const time = formatTime(input.time, flags);
        if (time) header.time = time;

        const body: Fields = { msg: input.message, level: input.levelName };
        return stringifyFields(mergeFields(mergeFields(input.fields, body), header));
    }

    flags(): number | undefined {
        return Flags.Disabled;
    }

    prefixes(): LevelTags | undefined {
        return EMPTY_TAGS;
    }
}

/**
 * Wraps another formatter (plain by default) and paints the level tags
 * with ANSI colors. Output and flags are the wrapped formatter's.
 */
export class ColorizedFormatter implements Formatter {
    private readonly tags: LevelTags | undefined;

    constructor(
        private readonly inner: Formatter = new PlainFormatter(),
        color: ColorMode = 'auto',
    ) {
        this.tags = useColor(color) ? paintTags(inner.prefixes() ?? LEVEL_TAGS) : inner.prefixes();
    }

    output(input: FormatInput): string {
        // one more frame between the inner formatter and the caller
        return this.inner.output({ ...input, depth: input.depth + 1 });
    }

    flags(): number | undefined {
        return this.inner.flags();
    }

    prefixes(): LevelTags | undefined {
        return this.tags;
    }
}

/* ----------------------------- Format helpers ------------------------------ */

/** Color is auto by default: on for a TTY outside production. */
export function useColor(color: ColorMode, env: Record<string, string | undefined> = process.env): boolean {
    if (color !== 'auto') return color === 'on';
    return !!process.stdout.isTTY && env.NODE_ENV !== 'production';
}

export function paintTags(tags: LevelTags): LevelTags {
    return mapTags(tags, (tag, level) => tag ? levelColor[level](tag) : '');
}
