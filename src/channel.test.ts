import { describe, expect, it } from 'vitest';
import { Channel } from './channel';
import { MemorySink } from './sinks';
import { Flags } from './types';

const NOW = Date.UTC(2024, 0, 2, 3, 4, 5, 678);
const clock = () => NOW;

function channel(flags: number) {
  const sink = new MemorySink();
  return { sink, channel: new Channel(sink, 'INFO : ', flags, clock) };
}

describe('Channel', () => {
  it('writes prefix and text as one line', () => {
    const { sink, channel: ch } = channel(Flags.Disabled);
    ch.output(0, 'hello');
    expect(sink.chunks).toEqual(['INFO : hello\n']);
  });

  it('does not double a trailing newline', () => {
    const { sink, channel: ch } = channel(Flags.Disabled);
    ch.output(0, 'line\n');
    expect(sink.text()).toBe('INFO : line\n');
  });

  it('adds date and time', () => {
    const { sink, channel: ch } = channel(Flags.Std | Flags.UTC);
    ch.output(0, 'hello');
    expect(sink.text()).toBe('INFO : 2024/01/02 03:04:05 hello\n');
  });

  it('adds microseconds', () => {
    const { sink, channel: ch } = channel(Flags.Date | Flags.Microseconds | Flags.UTC);
    ch.output(0, 'hello');
    expect(sink.text()).toBe('INFO : 2024/01/02 03:04:05.678000 hello\n');
  });

  it('moves the prefix before the message', () => {
    const { sink, channel: ch } = channel(Flags.Time | Flags.UTC | Flags.MsgPrefix);
    ch.output(0, 'hello');
    expect(sink.text()).toBe('03:04:05 INFO : hello\n');
  });

  it('takes new flags', () => {
    const { sink, channel: ch } = channel(Flags.Disabled);
    ch.setFlags(Flags.Date | Flags.UTC);
    ch.output(0, 'hello');
    expect(ch.getFlags()).toBe(Flags.Date | Flags.UTC);
    expect(sink.text()).toBe('INFO : 2024/01/02 hello\n');
  });
});
