import { closeSync, openSync, writeSync } from 'node:fs';
import { SinkClosedError } from './errors';
import type { ErrorReporter, Sink } from './types';
import { describeError } from './utils';

/** Anything with a string `write`, e.g. `process.stdout` or a file stream. */
export interface WritableLike {
  write(chunk: string): unknown;
}

/**
 * Stream sink for Node.js writable streams
 */
export class StreamSink implements Sink {
  constructor(
    private readonly stream: WritableLike,
    readonly name: string = 'stream',
  ) {}

  write(chunk: string): void {
    this.stream.write(chunk);
  }
}

/**
 * Appends to a file with synchronous writes. Closed by the owning logger.
 */
export class FileSink implements Sink {
  readonly name: string;
  private fd: number | undefined;

  constructor(readonly path: string) {
    this.name = `file:${path}`;
    this.fd = openSync(path, 'a');
  }

  write(chunk: string): void {
    if (this.fd === undefined) throw new SinkClosedError(`${this.name} is closed`);
    writeSync(this.fd, chunk);
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    closeSync(fd);
  }
}

/**
 * Memory sink for testing or buffering logs
 */
export class MemorySink implements Sink {
  readonly name: string;
  public chunks: string[] = [];
  public closed = false;

  constructor(name = 'memory') {
    this.name = name;
  }

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  close(): void {
    this.closed = true;
  }

  clear(): void {
    this.chunks = [];
  }

  /** Everything written so far. */
  text(): string {
    return this.chunks.join('');
  }

  /** Written lines, without their trailing newline. */
  getLines(): string[] {
    const text = this.text();
    if (!text) return [];
    return (text.endsWith('\n') ? text.slice(0, -1) : text).split('\n');
  }
}

/**
 * No-op sink that discards all logs
 */
export class NoOpSink implements Sink {
  readonly name = 'noop';

  write(_chunk: string): void {
    // Intentionally empty
  }
}

/**
 * Fan-out: the same text goes to every sink, in order.
 * A failing sink is reported and skipped; the others still get the line.
 */
export class MultiSink implements Sink {
  readonly name = 'multi';

  constructor(
    private readonly sinks: readonly Sink[],
    private readonly onError: ErrorReporter,
  ) {}

  write(chunk: string): void {
    for (const sink of this.sinks) {
      try {
        sink.write(chunk);
      } catch (err) {
        this.onError(`Failed to write log ${sinkName(sink)}: ${describeError(err)}`, err);
      }
    }
  }
}

export function isCloseable(sink: Sink): sink is Sink & { close(): void | Promise<void> } {
  return typeof sink.close === 'function';
}

export function sinkName(sink: Sink): string {
  return sink.name ?? sink.constructor.name;
}
