/**
 * tierlog: leveled, multi-destination logging for Node
 * (console, system log, files) with plain, JSON and colorized output.
 */

export { Logger, FLUSH_TIMEOUT_MS } from './logger';
export type { LoggerState } from './logger';
export {
  createLogger,
  createStdLogger,
  createSyslogLogger,
  createJsonLogger,
  createColorLogger,
} from './create';
export {
  defaultLogger,
  installDefaultLogger,
  resetDefaultLogger,
  debug,
  debugf,
  info,
  infof,
  warn,
  warnf,
  error,
  errorf,
  panic,
  panicf,
  fatal,
  fatalf,
  setLevel,
  setLevelMask,
  setFlags,
  withFields,
  withContextFields,
  close,
} from './default';
export { PlainFormatter, JsonFormatter, ColorizedFormatter } from './format';
export type { ColorMode } from './format';
export { StreamSink, FileSink, MemorySink, NoOpSink, MultiSink, isCloseable } from './sinks';
export type { WritableLike } from './sinks';
export { SyslogSink, syslogProvider, udpTransport, defaultSystemLog, SyslogSeverity } from './syslog';
export type { SyslogOptions, SyslogTransport } from './syslog';
export { mergeFields, renderFields, stringifyFields, parseFields } from './fields';
export {
  enabled,
  maskEnabled,
  levelBit,
  thresholdMask,
  isEnabled,
  parseLevel,
  resolveLevel,
  EMIT_LEVELS,
  LEVEL_NAMES,
  LEVEL_TAGS,
} from './levels';
export type { Severity } from './levels';
export {
  LoggerError,
  SystemLogUnavailableError,
  LoggerClosedError,
  SinkClosedError,
  PanicError,
} from './errors';
export { Level, LevelDefault, LevelMask, Flags } from './types';
export type {
  EmitLevel,
  LevelName,
  Fields,
  LevelTags,
  Sink,
  FormatInput,
  Formatter,
  ErrorReporter,
  SystemLogChannels,
  SystemLogProvider,
  LoggerOptions,
} from './types';

// Default export
import { createLogger, createStdLogger } from './create';
import { Level } from './types';

export default {
  createLogger,
  createStdLogger,
  Level,
};
