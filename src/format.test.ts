import { describe, expect, it } from 'vitest';
import { ColorizedFormatter, JsonFormatter, PlainFormatter, useColor } from './format';
import { LEVEL_NAMES } from './levels';
import { Flags, Level } from './types';
import type { EmitLevel, Fields, FormatInput } from './types';

const NOW = Date.UTC(2024, 0, 2, 3, 4, 5, 678);

function input(level: EmitLevel, message: string, fields: Fields = {}, flags: number = Flags.Disabled): FormatInput {
  return { flags, level, levelName: LEVEL_NAMES[level], fields, message, time: NOW, depth: 0 };
}

describe('PlainFormatter', () => {
  const formatter = new PlainFormatter();

  it('puts the sorted fields before the message', () => {
    const fields = { bool: true, int: 7, second: 2, string: 'test' };
    expect(formatter.output(input(Level.Info, 'check field', fields))).toBe('bool=true int=7 second=2 string=test check field');
  });

  it('ignores flags and leaves the channel settings alone', () => {
    expect(formatter.output(input(Level.Info, 'x', {}, Flags.Std | Flags.ShortFile))).toBe('x');
    expect(formatter.flags()).toBeUndefined();
    expect(formatter.prefixes()).toBeUndefined();
  });
});

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter();

  it('writes time, level and msg ahead of the fields', () => {
    const out = formatter.output(input(Level.Info, 'signed in', { user: 'ada', attempt: 2 }, Flags.Std | Flags.UTC));
    expect(out).toBe('{"time":"2024/01/02 03:04:05","level":"info","msg":"signed in","user":"ada","attempt":2}');
  });

  it('adds microseconds when asked', () => {
    const out = formatter.output({ ...input(Level.Debug, 'tick', {}, Flags.Date | Flags.Microseconds | Flags.UTC), time: NOW + 0.25 });
    expect(out).toBe('{"time":"2024/01/02 03:04:05.678250","level":"debug","msg":"tick"}');
  });

  it('omits time without date/time flags and lets the message win over a msg field', () => {
    expect(formatter.output(input(Level.Warning, 'real', { msg: 'ignored' }))).toBe('{"level":"warning","msg":"real"}');
  });

  it('forces channel flags off and prefixes empty', () => {
    expect(formatter.flags()).toBe(Flags.Disabled);
    expect(formatter.prefixes()?.[Level.Error]).toBe('');
    expect(formatter.prefixes()?.[Level.Debug]).toBe('');
  });
});

describe('ColorizedFormatter', () => {
  it('paints the level tags', () => {
    const tags = new ColorizedFormatter(new PlainFormatter(), 'on').prefixes();
    expect(tags?.[Level.Fatal]).toBe('\x1b[31mFATAL: \x1b[0m');
    expect(tags?.[Level.Error]).toBe('\x1b[31mERROR: \x1b[0m');
    expect(tags?.[Level.Warning]).toBe('\x1b[33mWARN : \x1b[0m');
    expect(tags?.[Level.Info]).toBe('\x1b[36mINFO : \x1b[0m');
    expect(tags?.[Level.Debug]).toBe('\x1b[37mDEBUG: \x1b[0m');
  });

  it('delegates output and flags to the wrapped formatter', () => {
    const formatter = new ColorizedFormatter(new PlainFormatter(), 'on');
    expect(formatter.output(input(Level.Info, 'hello', { a: 1 }))).toBe('a=1 hello');
    expect(formatter.flags()).toBeUndefined();
  });

  it('keeps the wrapped prefixes when color is off', () => {
    expect(new ColorizedFormatter(new PlainFormatter(), 'off').prefixes()).toBeUndefined();
  });

  it('does not paint empty prefixes', () => {
    const formatter = new ColorizedFormatter(new JsonFormatter(), 'on');
    expect(formatter.prefixes()?.[Level.Error]).toBe('');
    expect(formatter.flags()).toBe(Flags.Disabled);
  });
});

describe('useColor', () => {
  it('follows explicit modes', () => {
    expect(useColor('on')).toBe(true);
    expect(useColor('off')).toBe(false);
  });

  it('stays off in production', () => {
    expect(useColor('auto', { NODE_ENV: 'production' })).toBe(false);
  });
});
