import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.wrapper]:    { emoji: '📦', color: 'blue' },
    [LogChannel.loader]:     { emoji: '📝', color: 'purple' },
    [LogChannel.privilege]:  { emoji: '🔐', color: 'red' },
    [LogChannel.daemon]:     { emoji: '🛰️', color: 'cyan' },
    [LogChannel.supervisor]: { emoji: '🛠️', color: 'yellow' },
    [LogChannel.parser]:     { emoji: '🔎', color: 'green' },
    [LogChannel.state]:      { emoji: '💾', color: 'white' },
    [LogChannel.lifecycle]:  { emoji: '⏱️', color: 'magenta' },
    [LogChannel.v2v]:        { emoji: '🎬', color: 'white' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

/**
 * Request keys that carry credentials. Any of them showing up in a log
 * object, at the top level or one level down, is masked by pino.
 */
export const SECRET_KEYS = ['vmware_password', 'rhv_password', 'ssh_key'] as const

export function secretRedactPaths(): string[] {
    return SECRET_KEYS.flatMap(k => [k, `*.${k}`])
}
