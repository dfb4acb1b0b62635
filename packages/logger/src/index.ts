/**
 * @pricegrid/logger
 *
 * Structured logging for the pricegrid crawler.
 *
 * - JSON lines in production, coloured single lines in development
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with a component path and inherited context
 * - Pluggable sink (tests capture entries instead of printing)
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal (default: info)
 * - LOG_FORMAT: json | pretty (default: json in production, pretty otherwise)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

export type LogSink = (entry: LogEntry) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.trim().toLowerCase()
  return level && isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(raw: string | undefined, nodeEnv: string | undefined): LogFormat {
  const format = raw?.trim().toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return nodeEnv === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

/**
 * Console sink. Errors and fatals go to stderr so a crawl piped to a file
 * still surfaces failures on the terminal.
 */
export function consoleSink(format: LogFormat): LogSink {
  return entry => {
    const line = format === 'json' ? formatJson(entry) : formatPretty(entry)
    switch (entry.level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.info(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
      case 'fatal':
        console.error(line)
        break
    }
  }
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  /** Clock override for deterministic timestamps */
  now?: () => Date
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

interface ResolvedOptions {
  level: LogLevel
  sink: LogSink
  now: () => Date
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: ResolvedOptions

  constructor(service: string, options: LoggerOptions = {}, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = {
      level: options.level ?? resolveLogLevel(process.env.LOG_LEVEL),
      sink: options.sink ?? consoleSink(resolveLogFormat(process.env.LOG_FORMAT, process.env.NODE_ENV)),
      now: options.now ?? (() => new Date()),
    }
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.options.level]) return

    const entry: LogEntry = {
      ...this.defaultContext,
      ...meta,
      timestamp: this.options.now().toISOString(),
      level,
      service: this.service,
      message,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    this.options.sink(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.options, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }

    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, this.options, component, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('harvester')
 * const fetchLog = logger.child('fetch', { source: 'birmarket' })
 * fetchLog.info('Page fetched', { page: 2 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, options)
}

/**
 * Sink that keeps entries in memory. Used by tests to assert on log output.
 */
export function createMemorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const sink = (entry: LogEntry) => {
    entries.push(entry)
  }
  return Object.assign(sink, { entries })
}
