/**
 * Structured JSON logger — lightweight, zero-dependency.
 *
 * Usage:
 *   import { logger } from './logger'
 *   const log = logger.child({ component: 'simulation' })
 *   log.info('transaction applied', { stateVersion: 3, fitness: 412500 })
 *
 * Output (one JSON object per line):
 *   {"timestamp":"2026-01-05T12:00:00.000Z","level":"info","message":"transaction applied","component":"simulation","stateVersion":3,"fitness":412500}
 *
 * Configure via LOG_LEVEL env var (default: "info").
 * Levels in ascending severity: debug, info, warn, error
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What the engine's callers need from a logger; Logger and its children both satisfy it. */
export interface LogWriter {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): LogWriter
}

export class Logger implements LogWriter {
  private threshold: number

  constructor(level?: LogLevel) {
    const effective = level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    const line = JSON.stringify(entry)

    if (level === 'error') {
      process.stderr.write(line + '\n')
    } else {
      process.stdout.write(line + '\n')
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  /** Child logger that injects fixed context fields into every log line. */
  child(defaults: LogContext): LogWriter {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements LogWriter {
  constructor(
    private parent: LogWriter,
    private defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: LogContext): LogWriter {
    return new ChildLogger(this, defaults)
  }
}

/** Singleton logger instance for the process. */
export const logger = new Logger()
