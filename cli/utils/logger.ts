/**
 * Logger Utility
 *
 * Provides consistent, colorful logging for benchmark runs.
 * Supports different log levels and contexts.
 */

export type LogLevel = 'debug' | 'warn' | 'error'

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
  colors?: boolean
  /** Sink for plain output lines (default: console.log) */
  write?: (line: string) => void
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
}

const icons = {
  debug: colors.gray + '[debug]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
}

// Log level priority
const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
}

/**
 * Logger class for CLI output
 */
export class Logger {
  private level: LogLevel
  private context: string
  private silent: boolean
  private useColors: boolean
  private write: (line: string) => void

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'warn')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
    this.useColors = options.colors ?? (process.stdout.isTTY ?? false)
    this.write = options.write ?? ((line) => console.log(line))
  }

  /**
   * Format a message with context and level
   */
  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const icon = this.useColors ? icons[level] : `[${level}]`
    const ctx = this.context ? (this.useColors ? `${colors.dim}(${this.context})${colors.reset}` : `(${this.context})`) : ''

    let output = `${icon} ${ctx} ${message}`

    if (data) {
      const dataStr = JSON.stringify(data, null, 2)
      output += this.useColors ? `\n${colors.dim}${dataStr}${colors.reset}` : `\n${dataStr}`
    }

    return output
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data))
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data))
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data))
    }
  }

  /**
   * Plain output without formatting (progress lines, report tables)
   */
  log(message: string): void {
    if (!this.silent) {
      this.write(message)
    }
  }

  /**
   * Same logger with plain output sent to another sink
   */
  withSink(write: (line: string) => void): Logger {
    return new Logger({
      level: this.level,
      context: this.context,
      silent: this.silent,
      colors: this.useColors,
      write,
    })
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
      write: this.write,
    })
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(context?: string, options?: Omit<LoggerOptions, 'context'>): Logger {
  return new Logger({ ...options, context })
}

