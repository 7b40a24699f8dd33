import { CALLER_DEPTH } from './format';
import { Flags } from './types';
import type { Sink } from './types';
import { callerLocation, formatLocation, formatTime } from './utils';

/**
 * Writer for one severity: prefix + header (date, time, file:line) + text.
 * Header layout follows `flags`; `MsgPrefix` moves the prefix after the header.
 */
export class Channel {
  constructor(
    private readonly sink: Sink,
    readonly prefix: string,
    private flags: number,
    private readonly now: () => number,
  ) {}

  getFlags(): number {
    return this.flags;
  }

  setFlags(flags: number): void {
    this.flags = flags;
  }

  /**
   * Write one line. `depth` is the number of frames between the public
   * log call and the user's code, beyond the usual ones.
   */
  output(depth: number, text: string): void {
    const flags = this.flags;
    let location = '';
    if (flags & (Flags.LongFile | Flags.ShortFile)) {
      location = formatLocation(callerLocation(CALLER_DEPTH + depth), flags);
    }

    let line = flags & Flags.MsgPrefix ? '' : this.prefix;
    const time = formatTime(this.now(), flags);
    if (time) line += `${time} `;
    if (location) line += `${location}: `;
    if (flags & Flags.MsgPrefix) line += this.prefix;
    line += text;
    if (!text.endsWith('\n')) line += '\n';

    this.sink.write(line);
  }
}
