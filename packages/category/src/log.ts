/**
 * Structured logging.
 *
 * Emits one JSON line per event to stdout: { ts, level, scope, msg, ...fields }.
 * The header keys always win over fields of the same name.
 * The threshold starts at KITTEN_LOG_LEVEL and can be changed at runtime.
 */

import { settings } from '@kitten/config'
import type { LogLevel } from '@kitten/config'

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export type LogSink = (line: string) => void

export type LogFields = Record<string, unknown>

export interface Logger {
  error(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  debug(msg: string, fields?: LogFields): void
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line)
}

let threshold: LogLevel = settings.LOG_LEVEL
let sink: LogSink = stdoutSink

export function getLogLevel(): LogLevel {
  return threshold
}

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

/** Replace the line writer. Returns the previous one so callers can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink
  sink = next
  return previous
}

function emit(level: Exclude<LogLevel, 'silent'>, scope: string, msg: string, fields?: LogFields): void {
  if (SEVERITY[level] > SEVERITY[threshold]) return
  const entry = {
    ...fields,
    ts: new Date().toISOString(),
    level,
    scope,
    msg,
  }
  sink(JSON.stringify(entry) + '\n')
}

export function createLogger(scope: string): Logger {
  return {
    error: (msg, fields) => emit('error', scope, msg, fields),
    warn: (msg, fields) => emit('warn', scope, msg, fields),
    info: (msg, fields) => emit('info', scope, msg, fields),
    debug: (msg, fields) => emit('debug', scope, msg, fields),
  }
}
