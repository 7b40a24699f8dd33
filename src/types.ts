/**
 * Log levels in order of severity (lower is more severe).
 * `Off` is only meaningful as a threshold: nothing passes it.
 */
export enum Level {
  Off = -1,
  Fatal = 0,
  Panic = 1,
  Error = 2,
  Warning = 3,
  Info = 4,
  Debug = 5,
}

/** Levels a log call can be made at. */
export type EmitLevel = Exclude<Level, Level.Off>;

export const LevelDefault = Level.Info;

/**
 * One bit per level, for the mask flavour of the severity gate.
 */
export enum LevelMask {
  None = 0,
  Fatal = 1 << Level.Fatal,
  Panic = 1 << Level.Panic,
  Error = 1 << Level.Error,
  Warning = 1 << Level.Warning,
  Info = 1 << Level.Info,
  Debug = 1 << Level.Debug,
  Default = Fatal | Panic | Error | Warning | Info,
  All = Default | Debug,
}

/**
 * Line header decoration, applied by the per-level channels.
 */
export enum Flags {
  Disabled = 0,
  /** the date in the local time zone: 2009/01/23 */
  Date = 1 << 0,
  /** the time in the local time zone: 01:23:23 */
  Time = 1 << 1,
  /** microsecond resolution: 01:23:23.123123; assumes Time */
  Microseconds = 1 << 2,
  /** full file name and line number: /a/b/c/d.ts:23 */
  LongFile = 1 << 3,
  /** final file name element and line number: d.ts:23; overrides LongFile */
  ShortFile = 1 << 4,
  /** if Date or Time is set, use UTC rather than the local time zone */
  UTC = 1 << 5,
  /** move the prefix from the beginning of the line to before the message */
  MsgPrefix = 1 << 6,
  Std = Date | Time,
}

/**
 * String representation of log levels
 */
export type LevelName = 'fatal' | 'panic' | 'error' | 'warning' | 'info' | 'debug';

/**
 * Structured key/value context attached to a log call.
 */
export type Fields = Readonly<Record<string, unknown>>;

/** Channel prefix per level. */
export type LevelTags = Readonly<Record<EmitLevel, string>>;

/**
 * Destination for rendered log lines.
 * A sink that also has `close` is owned by the logger it was given to.
 * `close` may return a promise that settles once pending writes are out.
 */
export interface Sink {
  write(chunk: string): void;
  close?(): void | Promise<void>;
  /** Used when reporting failures. */
  readonly name?: string;
}

/**
 * Everything a formatter needs to render one call.
 */
export interface FormatInput {
  /** Output flags requested on the logger. */
  flags: number;
  level: EmitLevel;
  levelName: LevelName;
  fields: Fields;
  message: string;
  /** Epoch milliseconds, possibly fractional. */
  time: number;
  /** Extra stack frames between the public log call and the user's code. */
  depth: number;
}

/**
 * Output strategy of a logger.
 */
export interface Formatter {
  /** Produce the text handed to the level's channel. */
  output(input: FormatInput): string;
  /** Channel flags forced by this formatter, or undefined to use the logger's. */
  flags(): number | undefined;
  /** Channel prefixes forced by this formatter, or undefined for the plain tags. */
  prefixes(): LevelTags | undefined;
}

/** Receives internal failures (write, close, format) of a logger. */
export type ErrorReporter = (message: string, error: unknown) => void;

/** System log destination per level; levels left out get none. */
export type SystemLogChannels = Partial<Record<EmitLevel, Sink>>;

/**
 * Acquires the platform system log for a source name.
 * Throwing means the system log is unavailable; construction carries on without it.
 */
export type SystemLogProvider = (name: string, report: ErrorReporter) => SystemLogChannels;

/**
 * Logger configuration
 */
export interface LoggerOptions {
  /** Output strategy. Default: plain text. */
  formatter?: Formatter;
  /**
   * Threshold. If omitted, resolves from env:
   * - `DEBUG_MODE=1|true|yes|on` => Debug
   * - `LOG_LEVEL=fatal|panic|error|warning|info|debug|off|0..5`
   * - Otherwise: `NODE_ENV=production` => `prodDefault`, else `LevelDefault`.
   */
  level?: Level;
  /** Default threshold under `NODE_ENV=production`. Default: `LevelDefault`. */
  prodDefault?: Level;
  /** Environment bag used for level resolving. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Header flags. Default: `Flags.Std`. */
  flags?: number;
  /** Clock source (epoch ms). Default: `performance.timeOrigin + performance.now()`. */
  now?: () => number;
  /**
   * Called with 1 after a fatal call has been written and the owned sinks
   * have closed (or `FLUSH_TIMEOUT_MS` passed). Default: `process.exit`.
   */
  exit?: (code: number) => void;
  /**
   * Called after a panic call has been written, with the message and the
   * logger's pending close. Default: throws `PanicError`.
   */
  onPanic?: (message: string, closed: Promise<void>) => void;
  /** System log acquisition used by `createSyslogLogger`. */
  systemLog?: SystemLogProvider;
  /** Last-resort destinations. Default: process stdout / stderr. */
  streams?: {
    stdout?: Sink;
    stderr?: Sink;
  };
  /** Internal failure reporter. Default: a line on the stderr stream. */
  onError?: ErrorReporter;
}
