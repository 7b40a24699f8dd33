import { PlainFormatter } from './format';
import { LEVEL_TAGS, mapTags } from './levels';
import { Logger } from './logger';
import { StreamSink } from './sinks';
import { Flags, Level } from './types';
import type { Fields, LevelTags } from './types';
import { sprint, sprintf } from './utils';

/*
 * Process-wide logger for the convenience functions below.
 * Until a logger is constructed it is a stderr-only fallback that flags every
 * line; the first constructed logger replaces it, later ones leave it alone.
 * Prefer passing a Logger around; these exist for ergonomics.
 */

const INIT_TEXT = 'ERROR: Logging before logger initialization.\n';

const FALLBACK_TAGS = mapTags(LEVEL_TAGS, (tag) => INIT_TEXT + tag);

/** Plain output under tags that say no logger was set up. */
class FallbackFormatter extends PlainFormatter {
    prefixes(): LevelTags | undefined {
        return FALLBACK_TAGS;
    }
}

let current: Logger | undefined;
let installed = false;

function createFallbackLogger(): Logger {
    const stderr = new StreamSink(process.stderr, 'stderr');
    return new Logger('', false, undefined, {
        streams: { stdout: stderr, stderr },
        flags: Flags.Date | Flags.Microseconds | Flags.ShortFile,
        formatter: new FallbackFormatter(),
    });
}

/** The process-wide logger (a stderr fallback until one is constructed). */
export function defaultLogger(): Logger {
    current ??= createFallbackLogger();
    return current;
}

/** Make `logger` the process-wide one, unless one was already installed. */
export function installDefaultLogger(logger: Logger): Logger {
    if (!installed) {
        current = logger;
        installed = true;
    }
    return logger;
}

/** Forget the process-wide logger; the next use gets a fresh fallback. For tests. */
export function resetDefaultLogger(): void {
    current = undefined;
    installed = false;
}

/* ---------------------------- Convenience calls ---------------------------- */

export function debug(...args: unknown[]): void {
    defaultLogger().log(Level.Debug, 0, sprint(args));
}

export function debugf(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Debug, 0, sprintf(format, args));
}

export function info(...args: unknown[]): void {
    defaultLogger().log(Level.Info, 0, sprint(args));
}

export function infof(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Info, 0, sprintf(format, args));
}

export function warn(...args: unknown[]): void {
    defaultLogger().log(Level.Warning, 0, sprint(args));
}

export function warnf(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Warning, 0, sprintf(format, args));
}

export function error(...args: unknown[]): void {
    defaultLogger().log(Level.Error, 0, sprint(args));
}

export function errorf(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Error, 0, sprintf(format, args));
}

export function panic(...args: unknown[]): void {
    defaultLogger().log(Level.Panic, 0, sprint(args));
}

export function panicf(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Panic, 0, sprintf(format, args));
}

export function fatal(...args: unknown[]): void {
    defaultLogger().log(Level.Fatal, 0, sprint(args));
}

export function fatalf(format: string, ...args: unknown[]): void {
    defaultLogger().log(Level.Fatal, 0, sprintf(format, args));
}

export function setLevel(level: Level): void {
    defaultLogger().setLevel(level);
}

export function setLevelMask(mask: number): void {
    defaultLogger().setLevelMask(mask);
}

export function setFlags(flags: number): void {
    defaultLogger().setFlags(flags);
}

export function withFields(fields: Fields): Logger {
    return defaultLogger().withFields(fields);
}

export function withContextFields(fields: Fields): Logger {
    return defaultLogger().withContextFields(fields);
}

/** Close the process-wide logger; settles once its sinks are closed. */
export function close(): Promise<void> {
    return current?.close() ?? Promise.resolve();
}
