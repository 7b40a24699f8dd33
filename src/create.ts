import { installDefaultLogger } from './default';
import { ColorizedFormatter, JsonFormatter } from './format';
import type { ColorMode } from './format';
import { Logger } from './logger';
import type { LoggerOptions, Sink } from './types';

/*
 * Logger constructors. The first logger built here becomes the process-wide
 * default; later ones are independent.
 * If `out` also has `close`, it is closed when the logger is.
 */

/** Console logging: stdout for debug/info/warn, stderr for the rest. */
export function createStdLogger(options?: LoggerOptions): Logger {
  return installDefaultLogger(new Logger('', false, undefined, options));
}

/** Console logging plus the platform system log under source `name`. */
export function createSyslogLogger(name: string, options?: LoggerOptions): Logger {
  return installDefaultLogger(new Logger(name, true, undefined, options));
}

export function createJsonLogger(options?: LoggerOptions): Logger {
  return installDefaultLogger(new Logger('', false, undefined, {
    ...options,
    formatter: options?.formatter ?? new JsonFormatter(),
  }));
}

/** Plain output with ANSI-colored level tags; `color` defaults to `'on'`. */
export function createColorLogger(options?: LoggerOptions & { color?: ColorMode }): Logger {
  return installDefaultLogger(new Logger('', false, undefined, {
    ...options,
    formatter: options?.formatter ?? new ColorizedFormatter(undefined, options?.color ?? 'on'),
  }));
}

/** Log to `out` as well as the console. */
export function createLogger(out: Sink, options?: LoggerOptions): Logger {
  return installDefaultLogger(new Logger('', false, out, options));
}
