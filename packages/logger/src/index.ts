/**
 * @listingvault/logger
 *
 * Structured logging shared by the collector and the record store.
 * Every entry carries the service, the component path of the logger that
 * wrote it and whatever context its ancestors were created with.
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (default: info)
 * - LOG_FORMAT: json | pretty (default: json in production, pretty otherwise)
 * - LOG_REDACT: "true" to redact sensitive keys from startup
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

interface SerializedError {
  name: string
  message: string
  stack?: string
  cause?: string
}

interface LogRecord {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: SerializedError
  [key: string]: unknown
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal']

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  level: {
    debug: '\x1b[36m',
    info: '\x1b[32m',
    warn: '\x1b[33m',
    error: '\x1b[31m',
    fatal: '\x1b[35m',
  } satisfies Record<LogLevel, string>,
}

const REDACTED = '[REDACTED]'

/** Keys whose values never reach the log stream when redaction is on */
const SENSITIVE_KEYS = [
  /authorization/i,
  /password/i,
  /secret/i,
  /token/i,
  /cookie/i,
  /api[-_]?key/i,
  /credential/i,
  /^proxy[-_]?(url|auth)$/i,
]

const settings: { level: LogLevel | null; redact: boolean } = {
  level: null,
  redact: process.env.LOG_REDACT === 'true',
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value)
}

function minimumLevel(): LogLevel {
  if (settings.level) return settings.level
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

/**
 * Pin the minimum level for every logger in the process.
 * Pass null to fall back to LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | null): void {
  settings.level = level
}

export function setRedactionEnabled(enabled: boolean): void {
  settings.redact = enabled
}

function enabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(minimumLevel())
}

function usePrettyFormat(): boolean {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json') return false
  if (format === 'pretty') return true
  return process.env.NODE_ENV !== 'production'
}

function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined || error === null) return undefined
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) }
  }

  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack }
  if (error.cause !== undefined) {
    serialized.cause = error.cause instanceof Error ? `${error.cause.name}: ${error.cause.message}` : String(error.cause)
  }
  return serialized
}

function applyRedaction(context: LogContext): LogContext {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => [
      key,
      SENSITIVE_KEYS.some(pattern => pattern.test(key)) ? REDACTED : value,
    ])
  )
}

function renderPretty(record: LogRecord): string {
  const { timestamp, level, service, component, message, error, ...context } = record
  const origin = component ? `${service}:${component}` : service
  const contextText = Object.keys(context).length > 0 ? ` ${ANSI.dim}${JSON.stringify(context)}${ANSI.reset}` : ''
  const errorText = error ? `\n  ${ANSI.dim}${error.stack ?? `${error.name}: ${error.message}`}${ANSI.reset}` : ''

  return (
    `${ANSI.dim}${timestamp}${ANSI.reset} ` +
    `${ANSI.level[level]}${ANSI.bold}${level.toUpperCase().padEnd(5)}${ANSI.reset} ` +
    `${ANSI.dim}[${origin}]${ANSI.reset} ${message}${contextText}${errorText}`
  )
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.info(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
  fatal: line => console.error(line),
}

function emit(record: LogRecord): void {
  WRITERS[record.level](usePrettyFormat() ? renderPretty(record) : JSON.stringify(record))
}

export interface ILogger {
  debug(message: string, meta?: LogContext, error?: unknown): void
  info(message: string, meta?: LogContext, error?: unknown): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * A string extends the component path (`collector:store`); an object
   * adds context to every entry of the child.
   */
  child(componentOrContext: string | LogContext, context?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly context: LogContext = {}
  ) {}

  debug(message: string, meta?: LogContext, error?: unknown): void {
    this.write('debug', message, meta, error)
  }

  info(message: string, meta?: LogContext, error?: unknown): void {
    this.write('info', message, meta, error)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, context: LogContext = {}): ILogger {
    if (typeof componentOrContext !== 'string') {
      return new Logger(this.service, this.component, { ...this.context, ...componentOrContext })
    }
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, { ...this.context, ...context })
  }

  private write(level: LogLevel, message: string, meta: LogContext = {}, error?: unknown): void {
    if (!enabled(level)) return

    const merged = { ...this.context, ...meta }
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      ...(this.component ? { component: this.component } : {}),
      message,
      ...(settings.redact ? applyRedaction(merged) : merged),
    }

    const serialized = serializeError(error)
    if (serialized) {
      record.error = serialized
    }

    emit(record)
  }
}

/**
 * Root logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('collector')
 * logger.child('store').warn('Lock wait exceeded', { waitedMs: 10000 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
