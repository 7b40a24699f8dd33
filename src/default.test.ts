import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createColorLogger, createJsonLogger, createLogger, createStdLogger, createSyslogLogger } from './create';
import {
  close,
  debug,
  defaultLogger,
  errorf,
  fatal,
  info,
  infof,
  panic,
  resetDefaultLogger,
  setFlags,
  setLevel,
  setLevelMask,
  warn,
  withContextFields,
  withFields,
} from './default';
import { PanicError } from './errors';
import { MemorySink } from './sinks';
import { Flags, Level, LevelMask } from './types';
import type { LoggerOptions } from './types';

const NOW = Date.UTC(2024, 0, 2, 3, 4, 5, 678);

function quiet(options: LoggerOptions = {}): LoggerOptions {
  return {
    streams: { stdout: new MemorySink(), stderr: new MemorySink() },
    flags: Flags.Disabled,
    now: () => NOW,
    exit: vi.fn(),
    env: {},
    ...options,
  };
}

beforeEach(() => {
  resetDefaultLogger();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fallback logger', () => {
  it('flags lines logged before any logger exists', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    info('early');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith(expect.stringMatching(
      /^ERROR: Logging before logger initialization\.\nINFO : \d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{6} default\.test\.ts:\d+: early\n$/,
    ));
  });

  it('gives way to the first constructed logger', () => {
    const out = new MemorySink();
    const logger = createLogger(out, quiet());
    expect(defaultLogger()).toBe(logger);
  });
});

describe('default logger', () => {
  it('is the first logger constructed; later ones stay independent', () => {
    const out1 = new MemorySink();
    const out2 = new MemorySink();
    const first = createLogger(out1, quiet());
    const second = createLogger(out2, quiet());

    first.info('one');
    second.info('two');
    info('three');

    expect(out1.getLines()).toEqual(['INFO : one', 'INFO : three']);
    expect(out2.getLines()).toEqual(['INFO : two']);
    expect(defaultLogger()).toBe(first);
  });

  it('backs the convenience functions', () => {
    const out = new MemorySink();
    createLogger(out, quiet());

    setLevel(Level.Debug);
    debug('d');
    infof('%d items', 3);
    withFields({ a: 1 }).info('x');
    withContextFields({ req: 'r1' });
    warn('w');
    setLevelMask(LevelMask.Error);
    warn('hidden');
    errorf('code %s', 'E1');
    withContextFields({});
    setFlags(Flags.Time | Flags.UTC);
    setLevel(Level.Info);
    info('timed');

    expect(out.getLines()).toEqual([
      'DEBUG: d',
      'INFO : 3 items',
      'INFO : a=1 x',
      'WARN : req=r1 w',
      'ERROR: req=r1 code E1',
      'INFO : 03:04:05 timed',
    ]);
  });

  it('exits on fatal', () => {
    const exit = vi.fn();
    const out = new MemorySink();
    createLogger(out, quiet({ exit }));

    fatal('bye');

    expect(out.getLines()).toEqual(['FATAL: bye']);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('throws on panic', () => {
    createLogger(new MemorySink(), quiet());
    expect(() => panic('boom')).toThrow(PanicError);
  });

  it('closes through close()', async () => {
    const out = new MemorySink();
    const logger = createLogger(out, quiet());
    await close();
    expect(out.closed).toBe(true);
    expect(logger.getState()).toBe('closed');
  });
});

describe('constructors', () => {
  it('createStdLogger writes to the streams only', () => {
    const stdout = new MemorySink();
    const logger = createStdLogger(quiet({ streams: { stdout, stderr: new MemorySink() } }));
    logger.info('hi');
    expect(stdout.getLines()).toEqual(['INFO : hi']);
  });

  it('createSyslogLogger attaches the system log under its name', () => {
    const syslog = new MemorySink();
    const names: string[] = [];
    const logger = createSyslogLogger('app', quiet({
      systemLog: (name) => {
        names.push(name);
        return { [Level.Info]: syslog };
      },
    }));

    logger.info('hi');

    expect(names).toEqual(['app']);
    expect(syslog.getLines()).toEqual(['INFO : hi']);
  });

  it('createJsonLogger writes JSON', () => {
    const stdout = new MemorySink();
    const logger = createJsonLogger(quiet({ streams: { stdout, stderr: new MemorySink() } }));
    logger.withFields({ n: 1 }).info('hi');
    expect(stdout.getLines()).toEqual(['{"level":"info","msg":"hi","n":1}']);
  });

  it('createColorLogger paints tags even when stdout is not a terminal', () => {
    const stdout = new MemorySink();
    const logger = createColorLogger(quiet({ streams: { stdout, stderr: new MemorySink() }, env: { NODE_ENV: 'production' } }));
    logger.info('ready');
    expect(stdout.getLines()).toEqual(['\x1b[36mINFO : \x1b[0mready']);
  });

  it('createColorLogger paints tags', () => {
    const stdout = new MemorySink();
    const logger = createColorLogger({ ...quiet({ streams: { stdout, stderr: new MemorySink() } }), color: 'on' });
    logger.warn('careful');
    expect(stdout.getLines()).toEqual(['\x1b[33mWARN : \x1b[0mcareful']);
  });
});
