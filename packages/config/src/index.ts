// Shared configuration: environment settings and structured logging.

export {
  settings,
  loadSettings,
  DEFAULT_SETTINGS,
  LOG_LEVELS,
  type Settings,
  type LogLevel,
} from './settings'

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type LogSink,
} from './logger'
