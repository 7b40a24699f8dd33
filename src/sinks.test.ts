import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { SinkClosedError } from './errors';
import { FileSink, MemorySink, MultiSink, NoOpSink, StreamSink, isCloseable, sinkName } from './sinks';
import type { Sink } from './types';

describe('MultiSink', () => {
  it('writes the same text to every sink in order', () => {
    const order: string[] = [];
    const recorder = (name: string): Sink => ({ name, write: () => { order.push(name); } });
    new MultiSink([recorder('first'), recorder('second')], () => {}).write('x\n');
    expect(order).toEqual(['first', 'second']);
  });

  it('reports a failing sink and carries on', () => {
    const a = new MemorySink('a');
    const b = new MemorySink('b');
    const broken: Sink = { name: 'broken', write: () => { throw new Error('disk full'); } };
    const errors: string[] = [];

    new MultiSink([a, broken, b], (message) => { errors.push(message); }).write('x\n');

    expect(a.text()).toBe('x\n');
    expect(b.text()).toBe('x\n');
    expect(errors).toEqual(['Failed to write log broken: disk full']);
  });
});

describe('MemorySink', () => {
  it('splits what was written into lines', () => {
    const sink = new MemorySink();
    sink.write('one\n');
    sink.write('two\n');
    expect(sink.getLines()).toEqual(['one', 'two']);
    sink.clear();
    expect(sink.getLines()).toEqual([]);
  });

  it('records being closed', () => {
    const sink = new MemorySink();
    sink.close();
    expect(sink.closed).toBe(true);
  });
});

describe('StreamSink', () => {
  it('forwards chunks to the stream', () => {
    const written: string[] = [];
    new StreamSink({ write: (chunk: string) => written.push(chunk) }).write('hello\n');
    expect(written).toEqual(['hello\n']);
  });
});

describe('FileSink', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('appends lines and refuses writes once closed', () => {
    dir = mkdtempSync(join(tmpdir(), 'tierlog-'));
    const path = join(dir, 'app.log');
    const sink = new FileSink(path);

    sink.write('a\n');
    sink.write('b\n');
    sink.close();
    sink.close();

    expect(readFileSync(path, 'utf8')).toBe('a\nb\n');
    expect(() => sink.write('c\n')).toThrow(SinkClosedError);
    expect(sink.name).toBe(`file:${path}`);
  });
});

describe('isCloseable / sinkName', () => {
  it('tells owned sinks apart', () => {
    expect(isCloseable(new MemorySink())).toBe(true);
    expect(isCloseable(new NoOpSink())).toBe(false);
  });

  it('falls back on the class name', () => {
    class Unnamed implements Sink {
      write(): void {}
    }
    expect(sinkName(new Unnamed())).toBe('Unnamed');
    expect(sinkName(new MemorySink('audit'))).toBe('audit');
  });
});
