// packages/logging/src/types.ts

export enum LogChannel {
    wrapper = 'wrapper',
    loader = 'loader',
    privilege = 'privilege',
    daemon = 'daemon',
    supervisor = 'supervisor',
    parser = 'parser',
    state = 'state',
    lifecycle = 'lifecycle',

    // Raw output of the conversion subprocess that no grammar rule claimed
    v2v = 'v2v',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface CreateLoggerOptions {
    /**
     * File the log is written to. Written synchronously so that nothing is
     * lost when the process exits right after a fatal message.
     * When omitted, logs go to stdout.
     */
    destination?: string
    /** Defaults to PRETTY_LOGS (false when unset). */
    pretty?: boolean
    /** Defaults to LOG_LEVEL (info when unset). */
    level?: string
    /** Extra pino redaction paths, appended to the built-in secret keys. */
    redact?: string[]
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
