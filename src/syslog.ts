// POSIX system log channel: RFC 3164 lines sent over UDP.

import { createSocket } from 'node:dgram';
import { hostname } from 'node:os';
import { SinkClosedError, SystemLogUnavailableError } from './errors';
import { Level } from './types';
import type { EmitLevel, ErrorReporter, Sink, SystemLogChannels, SystemLogProvider } from './types';
import { describeError } from './utils';

/* ---------------------------------- Types ---------------------------------- */

export enum SyslogSeverity {
    Emergency = 0,
    Alert = 1,
    Critical = 2,
    Error = 3,
    Warning = 4,
    Notice = 5,
    Info = 6,
    Debug = 7,
}

export const FACILITY_USER = 1;

/** Carries framed messages to the syslog daemon. */
export interface SyslogTransport {
    send(message: string): void;
    /** May settle later, once messages already sent are out. */
    close(): void | Promise<void>;
}

export type SyslogOptions = {
    /** Default: 127.0.0.1 */
    host?: string;
    /** Default: 514 */
    port?: number;
    /** Default: user (1) */
    facility?: number;
    /** Transport factory; defaults to a UDP socket per channel. */
    transport?: (report: ErrorReporter) => SyslogTransport;
    /** Clock source for testing. Default: () => Date.now() */
    now?: () => number;
    hostname?: string;
    pid?: number;
};

/** Level → syslog severity; fatal shares the error channel. */
export const SYSLOG_SEVERITY: Readonly<Record<EmitLevel, SyslogSeverity>> = {
    [Level.Debug]:   SyslogSeverity.Debug,
    [Level.Info]:    SyslogSeverity.Notice,
    [Level.Warning]: SyslogSeverity.Warning,
    [Level.Error]:   SyslogSeverity.Error,
    [Level.Fatal]:   SyslogSeverity.Error,
    [Level.Panic]:   SyslogSeverity.Critical,
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/* --------------------------------- Framing --------------------------------- */

/** `<PRI>Mmm dd hh:mm:ss host tag[pid]: text`, local time, trailing newlines dropped. */
export function formatSyslogMessage(
    priority: number,
    time: number,
    host: string,
    tag: string,
    pid: number,
    text: string,
): string {
    const d = new Date(time);
    const two = (n: number) => String(n).padStart(2, '0');
    const stamp = `${MONTHS[d.getMonth()]} ${String(d.getDate()).padStart(2, ' ')} `
        + `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
    return `<${priority}>${stamp} ${host} ${tag}[${pid}]: ${text.replace(/\n+$/, '')}`;
}

/* ---------------------------------- Sinks ---------------------------------- */

/**
 * One syslog channel at a fixed facility/severity. Owns its transport.
 */
export class SyslogSink implements Sink {
    readonly name: string;

    constructor(
        private readonly tag: string,
        private readonly priority: number,
        private readonly transport: SyslogTransport,
        private readonly opts: { now?: () => number; hostname?: string; pid?: number } = {},
    ) {
        this.name = `syslog:${tag}<${priority}>`;
    }

    write(chunk: string): void {
        const now = this.opts.now ?? Date.now;
        this.transport.send(formatSyslogMessage(
            this.priority,
            now(),
            this.opts.hostname ?? hostname(),
            this.tag,
            this.opts.pid ?? process.pid,
            chunk,
        ));
    }

    close(): void | Promise<void> {
        return this.transport.close();
    }
}

/**
 * Datagram transport; the socket does not keep the process alive.
 * Sends go out after an implicit bind, so `close` waits for them.
 */
export function udpTransport(host: string, port: number, report: ErrorReporter): SyslogTransport {
    const socket = createSocket('udp4');
    socket.unref();
    socket.on('error', (err) => report(`syslog socket ${host}:${port}: ${err.message}`, err));

    let pending = 0;
    let drained: (() => void) | undefined;
    let closing: Promise<void> | undefined;

    return {
        send(message) {
            if (closing) {
                report(`Dropped syslog message after close: ${message}`, new SinkClosedError(`syslog ${host}:${port} is closed`));
                return;
            }
            pending++;
            socket.send(message, port, host, (err) => {
                pending--;
                if (err) report(`Failed to write log syslog ${host}:${port}: ${describeError(err)}`, err);
                if (pending === 0) drained?.();
            });
        },
        close() {
            closing ??= new Promise<void>((resolve) => {
                const shut = () => socket.close(() => resolve());
                if (pending === 0) shut();
                else drained = shut;
            });
            return closing;
        },
    };
}

/* -------------------------------- Providers -------------------------------- */

/**
 * System log provider writing to a syslog daemon.
 * Debug→debug, Info→notice, Warning→warning, Error/Fatal→err, Panic→crit.
 */
export function syslogProvider(options: SyslogOptions = {}): SystemLogProvider {
    return (name, report) => {
        const facility = options.facility ?? FACILITY_USER;
        const transport = options.transport
            ?? ((r: ErrorReporter) => udpTransport(options.host ?? '127.0.0.1', options.port ?? 514, r));
        const sink = (level: EmitLevel) => new SyslogSink(
            name,
            facility * 8 + SYSLOG_SEVERITY[level],
            transport(report),
            options,
        );

        const error = sink(Level.Error);
        const channels: SystemLogChannels = {
            [Level.Debug]:   sink(Level.Debug),
            [Level.Info]:    sink(Level.Info),
            [Level.Warning]: sink(Level.Warning),
            [Level.Error]:   error,
            [Level.Fatal]:   error,
            [Level.Panic]:   sink(Level.Panic),
        };
        return channels;
    };
}

/**
 * Platform default: syslog on POSIX. The Windows event log has no binding,
 * so acquisition fails there (and the logger carries on without it).
 */
export const defaultSystemLog: SystemLogProvider = (name, report) => {
    if (process.platform === 'win32') {
        throw new SystemLogUnavailableError(`system log is not available on ${process.platform} (source ${name})`);
    }
    return syslogProvider()(name, report);
};
