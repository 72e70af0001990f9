/**
 * Logger Utility
 *
 * Journal output of relay runs. Each component logs under its own context,
 * so a line reads `[info] (lastfm) Scrobbled 50 listens.` and a sync run
 * nests them as `(sync:lastfm)`.
 *
 * What goes where:
 * - `info`: one progress line per submitted batch or imported page
 * - `warn`: listens a service rejected (with the raw item as data), missing
 *   credentials, retried pages
 * - `debug`: request lines, batch size trials, rate-limit waits; shown with
 *   `--debug` or `DEBUG=1`
 * - `log`: unadorned text the operator must read or copy (the Last.fm
 *   authorization URL, the session key)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
  colors?: boolean
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
}

const levelColor: Record<LogLevel, string> = {
  debug: colors.gray,
  info: colors.blue,
  warn: colors.yellow,
  error: colors.red,
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export class Logger {
  private level: LogLevel
  private context: string
  private silent: boolean
  private useColors: boolean

  constructor(options: LoggerOptions = {}) {
    // Read per logger: `--debug` sets DEBUG before the command builds its loggers.
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
    this.useColors = options.colors ?? (process.stdout.isTTY ?? false)
  }

  /**
   * One journal line, with `data` pretty-printed below it
   */
  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const tag = this.paint(levelColor[level], `[${level}]`)
    const prefix = this.context ? `${tag} ${this.paint(colors.dim, `(${this.context})`)}` : tag

    let output = `${prefix} ${message}`
    if (data) {
      output += `\n${this.paint(colors.dim, JSON.stringify(data, null, 2))}`
    }
    return output
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data))
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
   * Plain output for the operator, at any level
   */
  log(message: string): void {
    if (!this.silent) {
      console.log(message)
    }
  }

  /**
   * Logger for a sub-component, e.g. `lastfm` under `sync`
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
    })
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  private paint(color: string, text: string): string {
    return this.useColors ? `${color}${text}${colors.reset}` : text
  }
}

export function createLogger(context?: string, options?: Omit<LoggerOptions, 'context'>): Logger {
  return new Logger({ ...options, context })
}
