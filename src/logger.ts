import { Channel } from './channel';
import { LoggerClosedError, PanicError } from './errors';
import { EMPTY_FIELDS, mergeFields } from './fields';
import { PlainFormatter } from './format';
import { EMIT_LEVELS, LEVEL_NAMES, LEVEL_TAGS, isEnabled, resolveLevel } from './levels';
import type { Severity } from './levels';
import { MultiSink, StreamSink, isCloseable, sinkName } from './sinks';
import { defaultSystemLog } from './syslog';
import { Flags, Level } from './types';
import type {
  EmitLevel,
  ErrorReporter,
  Fields,
  Formatter,
  LoggerOptions,
  Sink,
  SystemLogChannels,
} from './types';
import { defaultClock, describeError, formatValue, sprint, sprintf } from './utils';

export type LoggerState = 'uninitialized' | 'initialized' | 'closed';

/** Longest wait for owned sinks to close before a fatal call exits. */
export const FLUSH_TIMEOUT_MS = 1000;

function isPromise(value: unknown): value is Promise<void> {
  return value instanceof Promise;
}

/**
 * Leveled logger fanning each line out to the destinations of its level.
 *
 * Per level the destinations are, in order: the explicit writer, the system
 * log channel (when attached) and the default stream (stdout for
 * Debug/Info/Warning, stderr for Error/Panic/Fatal).
 */
export class Logger {
  private state: LoggerState = 'uninitialized';
  private readonly formatter: Formatter;
  private readonly channels: Readonly<Record<EmitLevel, Channel>>;
  private readonly closers: Array<Sink & { close(): void | Promise<void> }> = [];
  // closes still in flight; settles once every owned sink is released
  private closing: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private readonly now: () => number;
  private readonly exit: (code: number) => void;
  private readonly onPanic: (message: string, closed: Promise<void>) => void;
  private readonly report: ErrorReporter;
  private severity: Severity;
  private flags: number;
  // one-shot fields, consumed by the next call
  private pending: Fields = EMPTY_FIELDS;
  // re-applied on every call until replaced
  private bound: Fields = EMPTY_FIELDS;

  /**
   * @param name - source name for the system log
   * @param systemLog - attach the platform system log
   * @param out - explicit destination, used for every level
   */
  constructor(name: string, systemLog: boolean, out?: Sink, options: LoggerOptions = {}) {
    const stdout = options.streams?.stdout ?? new StreamSink(process.stdout, 'stdout');
    const stderr = options.streams?.stderr ?? new StreamSink(process.stderr, 'stderr');

    this.formatter = options.formatter ?? new PlainFormatter();
    this.now = options.now ?? defaultClock;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.onPanic = options.onPanic ?? ((message, closed) => { throw new PanicError(message, closed); });
    this.report = options.onError ?? ((message) => stderr.write(`${message}\n`));
    this.flags = options.flags ?? Flags.Std;
    this.severity = {
      kind: 'threshold',
      level: resolveLevel(options.level, options.env ?? process.env, options.prodDefault),
    };

    let system: SystemLogChannels = {};
    let systemError: unknown;
    if (systemLog) {
      try {
        system = (options.systemLog ?? defaultSystemLog)(name, this.report);
      } catch (err) {
        systemError = err;
      }
    }

    const tags = this.formatter.prefixes() ?? LEVEL_TAGS;
    const channelFlags = this.formatter.flags() ?? this.flags;
    const channel = (level: EmitLevel): Channel => {
      const targets: Sink[] = [];
      if (out) targets.push(out);
      const sys = system[level];
      if (sys) targets.push(sys);
      // stdout/stderr may not be writable (services); keep them last
      targets.push(level >= Level.Warning ? stdout : stderr);
      return new Channel(new MultiSink(targets, this.report), tags[level], channelFlags, this.now);
    };
    this.channels = {
      [Level.Fatal]:   channel(Level.Fatal),
      [Level.Panic]:   channel(Level.Panic),
      [Level.Error]:   channel(Level.Error),
      [Level.Warning]: channel(Level.Warning),
      [Level.Info]:    channel(Level.Info),
      [Level.Debug]:   channel(Level.Debug),
    };

    const owned = new Set<Sink>(out ? [out] : []);
    for (const level of EMIT_LEVELS) {
      const sys = system[level];
      if (sys) owned.add(sys);
    }
    for (const sink of owned) if (isCloseable(sink)) this.closers.push(sink);

    this.state = 'initialized';

    if (systemError !== undefined) this.log(Level.Error, 0, formatValue(systemError));
  }

  /* --------------------------------- Levels -------------------------------- */

  /** Ordered threshold: calls at least as severe as `level` pass. */
  setLevel(level: Level): void {
    this.severity = { kind: 'threshold', level };
  }

  /** Bitmask gate: calls pass when their `LevelMask` bit is set. */
  setLevelMask(mask: number): void {
    this.severity = { kind: 'mask', mask };
  }

  getSeverity(): Severity {
    return this.severity;
  }

  isEnabled(level: EmitLevel): boolean {
    return isEnabled(this.severity, level);
  }

  /**
   * Change the header flags. Channels keep the formatter's own flags when it
   * forces them (JSON); the formatter still sees the new value.
   */
  setFlags(flags: number): void {
    if (this.formatter.flags() === undefined) {
      for (const level of EMIT_LEVELS) this.channels[level].setFlags(flags);
    }
    this.flags = flags;
  }

  getFlags(): number {
    return this.flags;
  }

  getState(): LoggerState {
    return this.state;
  }

  /* --------------------------------- Fields -------------------------------- */

  /** Attach fields to the next call only. */
  withFields(fields: Fields): this {
    this.pending = mergeFields(this.pending, fields);
    return this;
  }

  /** Attach fields to every following call, replacing earlier context fields. */
  withContextFields(fields: Fields): this {
    this.bound = fields;
    return this;
  }

  /* --------------------------------- Emitters ------------------------------- */

  debug(...args: unknown[]): void {
    this.log(Level.Debug, 0, sprint(args));
  }

  debugf(format: string, ...args: unknown[]): void {
    this.log(Level.Debug, 0, sprintf(format, args));
  }

  info(...args: unknown[]): void {
    this.log(Level.Info, 0, sprint(args));
  }

  infof(format: string, ...args: unknown[]): void {
    this.log(Level.Info, 0, sprintf(format, args));
  }

  warn(...args: unknown[]): void {
    this.log(Level.Warning, 0, sprint(args));
  }

  warnf(format: string, ...args: unknown[]): void {
    this.log(Level.Warning, 0, sprintf(format, args));
  }

  error(...args: unknown[]): void {
    this.log(Level.Error, 0, sprint(args));
  }

  errorf(format: string, ...args: unknown[]): void {
    this.log(Level.Error, 0, sprintf(format, args));
  }

  /** Log, close, then hand the message to `onPanic` (throws `PanicError` by default). */
  panic(...args: unknown[]): void {
    this.log(Level.Panic, 0, sprint(args));
  }

  panicf(format: string, ...args: unknown[]): void {
    this.log(Level.Panic, 0, sprintf(format, args));
  }

  /** Log, close, then `exit(1)` once the owned sinks have flushed. */
  fatal(...args: unknown[]): void {
    this.log(Level.Fatal, 0, sprint(args));
  }

  fatalf(format: string, ...args: unknown[]): void {
    this.log(Level.Fatal, 0, sprintf(format, args));
  }

  /**
   * Emit one call. Wrappers around the logger pass the number of frames they
   * add in `depth`, so file:line still points at the application.
   * Fatal and panic calls terminate even when the gate drops the line.
   */
  log(level: EmitLevel, depth: number, message: string): void {
    const fields = mergeFields(this.pending, this.bound);
    this.pending = EMPTY_FIELDS;

    if (this.state !== 'initialized') {
      this.report(
        `Dropped ${LEVEL_NAMES[level]} log after close: ${message}`,
        new LoggerClosedError('logger is closed'),
      );
    } else if (isEnabled(this.severity, level)) {
      try {
        const text = this.formatter.output({
          flags: this.flags,
          level,
          levelName: LEVEL_NAMES[level],
          fields,
          message,
          time: this.now(),
          depth,
        });
        this.channels[level].output(depth, text);
      } catch (err) {
        this.report(`Failed to format log line: ${describeError(err)}`, err);
      }
    }

    if (level === Level.Fatal) {
      void this.close();
      this.afterClose(() => this.exit(1));
    } else if (level === Level.Panic) {
      this.onPanic(message, this.close());
    }
  }

  /* --------------------------------- Closing -------------------------------- */

  /**
   * Close the owned destinations (explicit writer, system log channels).
   * Failures are reported on the error stream. Later calls are dropped.
   * The promise settles once sinks with pending writes have flushed.
   */
  close(): Promise<void> {
    if (this.state !== 'initialized') return this.closing;
    this.state = 'closed';

    const waits: Promise<void>[] = [];
    for (const sink of this.closers) {
      try {
        const result: unknown = sink.close();
        if (isPromise(result)) waits.push(result.catch((err: unknown) => this.closeFailed(sink, err)));
      } catch (err) {
        this.closeFailed(sink, err);
      }
    }

    this.inFlight = waits.length;
    this.closing = Promise.all(waits).then(() => {
      this.inFlight = 0;
    });
    return this.closing;
  }

  private closeFailed(sink: Sink, err: unknown): void {
    this.report(`Failed to close log ${sinkName(sink)}: ${describeError(err)}`, err);
  }

  /** Run `fn` once closing is done: right away when nothing is pending, else at most `FLUSH_TIMEOUT_MS` later. */
  private afterClose(fn: () => void): void {
    if (this.inFlight === 0) {
      fn();
      return;
    }
    let done = false;
    const finish = () => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      fn();
    };
    // keeps the process alive while the sinks drain
    const timer = setTimeout(finish, FLUSH_TIMEOUT_MS);
    void this.closing.then(finish);
  }
}
