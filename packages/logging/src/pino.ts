import { pino, destination as fileDestination, type Logger, type LoggerOptions, type DestinationStream } from 'pino'
import { PinoPretty } from 'pino-pretty'
import {
    type ChannelLogger,
    type CreateLoggerOptions,
    type LoggerBundle,
    type LogLevel,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, secretRedactPaths } from './channels.js'

function envFlag(v: string | undefined, def: boolean): boolean {
    if (v === undefined) return def
    return v.trim().toLowerCase() === 'true'
}

export function createLogger(service: string, opts: CreateLoggerOptions = {}): LoggerBundle {
    const PRETTY = opts.pretty ?? envFlag(process.env.PRETTY_LOGS, false)
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service, pid: process.pid },
        timestamp: pino.stdTimeFunctions.isoTime,
        redact: { paths: [...secretRedactPaths(), ...(opts.redact ?? [])] },
        formatters: {
            level(label) { return { level: label } },
        },
    }

    let destination: DestinationStream | undefined
    if (PRETTY) {
        destination = PinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: opts.destination === undefined,
            singleLine: false,
            ignore: 'pid,hostname,service,channel',
            ...(opts.destination !== undefined
                ? { destination: opts.destination, mkdir: true, sync: true }
                : {}),
        })
    } else if (opts.destination !== undefined) {
        destination = fileDestination({ dest: opts.destination, mkdir: true, sync: true })
    }

    const base: Logger = destination ? pino(options, destination) : pino(options)

    // Colored channel prefixes only make sense in pretty output; JSON lines
    // carry the channel as a field instead.
    const label = (ch: LogChannel, msg: string): string => {
        if (!PRETTY) return msg
        const meta = CHANNELS[ch]
        const color = opts.destination === undefined ? ANSI[meta.color] : ''
        const reset = opts.destination === undefined ? RESET : ''
        return `${color}${meta.emoji} [${ch}]:${reset} ${msg}`
    }

    const write = (ch: LogChannel, level: LogLevel, msg: string, extra?: Record<string, unknown>): void => {
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }
        base[level](obj, label(ch, msg))
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => write(ch, 'debug', msg, extra),
        info: (msg, extra) => write(ch, 'info', msg, extra),
        warn: (msg, extra) => write(ch, 'warn', msg, extra),
        error: (msg, extra) => write(ch, 'error', msg, extra),
        fatal: (msg, extra) => write(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}

/**
 * Logger that drops everything. Used where a component is exercised without
 * a job (unit tests, `--version`).
 */
export function createSilentLogger(): LoggerBundle {
    const base = pino({ level: 'silent' })
    const noop = (): void => {}
    const silent: ChannelLogger = { debug: noop, info: noop, warn: noop, error: noop, fatal: noop }
    return { base, channel: () => silent }
}
