// Shared ambient configuration: environment reading and structured logging.

export {
  optional,
  readLogLevel,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from './env.js'

export {
  createLogger,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogFields,
  type LogSink,
} from './logger.js'
