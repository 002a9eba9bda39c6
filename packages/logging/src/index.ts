export { createLogger, createSilentLogger } from './pino.js'
export { CHANNELS, SECRET_KEYS, secretRedactPaths } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type CreateLoggerOptions,
    type LoggerBundle,
    type LogLevel,
} from './types.js'
