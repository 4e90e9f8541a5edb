/**
 * Structured logging.
 *
 * Emits one JSON line per entry with:
 * - timestamp, level, scope, message, and any extra fields
 *
 * Zero external dependencies. Entries below the configured level are dropped
 * before serialization.
 */

import { settings, LOG_LEVELS } from './settings'
import type { LogLevel } from './settings'

export type LogFields = Readonly<Record<string, unknown>>

export type LogSink = (line: string) => void

export interface Logger {
  readonly scope: string
  readonly level: LogLevel
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Derive a logger whose scope is `parent:child`. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level)
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? settings.logLevel
  const sink = options.sink ?? stdoutSink
  const threshold = severity(level)

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (severity(entryLevel) < threshold) return
    const entry = {
      ts: new Date().toISOString(),
      level: entryLevel,
      scope,
      msg,
      ...fields,
    }
    sink(JSON.stringify(entry))
  }

  return {
    scope,
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (name) => createLogger(`${scope}:${name}`, { level, sink }),
  }
}
