/** Base class for errors raised by the logger itself. */
export class LoggerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The platform system log could not be acquired. */
export class SystemLogUnavailableError extends LoggerError {}

/** A call reached a logger after `close()`. */
export class LoggerClosedError extends LoggerError {}

/** A write reached a sink after it was closed. */
export class SinkClosedError extends LoggerError {}

/**
 * Raised by a panic-level call once the line is written.
 * `message` is the rendered log message; await `closed` before exiting
 * to let sinks such as syslog flush.
 */
export class PanicError extends LoggerError {
  constructor(message: string, readonly closed: Promise<void> = Promise.resolve()) {
    super(message);
  }
}
