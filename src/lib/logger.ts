/**
 * Run logger
 *
 * Every run appends to a daily log file, one JSON line per event. With
 * `console` enabled the same events also go to stderr.
 */

import path from 'node:path'
import pino, { type Logger } from 'pino'
import { formatDayStamp } from './time.js'

export type { Logger }

export const REDACT_KEYS = ['password', '*.password', 'credentials', '*.credentials']

export interface CreateLoggerOptions {
  /** Directory holding the daily log files */
  logsDir: string
  /** Also write to stderr */
  console?: boolean
  level?: string
  now?: Date
}

/**
 * Path of the log file for a given day
 */
export function logFilePath(logsDir: string, now: Date = new Date()): string {
  return path.join(logsDir, `script_${formatDayStamp(now)}.log`)
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const { logsDir, console: toConsole = false, level = 'info', now } = options

  const streams: pino.StreamEntry[] = [
    {
      level: 'debug',
      stream: pino.destination({ dest: logFilePath(logsDir, now), append: true, mkdir: true, sync: true })
    }
  ]

  if (toConsole) {
    streams.push({ level: 'debug', stream: process.stderr })
  }

  return pino(
    {
      level,
      base: { system: 'tapekeeper' },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_KEYS, censor: '[REDACTED]' }
    },
    pino.multistream(streams)
  )
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
