import fs from 'node:fs'
import { Chalk, type ChalkInstance } from 'chalk'
import { format as formatDate } from 'date-fns'
import { errorMessage } from './errors'

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error'

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 2,
  warning: 3,
  error: 4,
}

export type LogSink = (line: string, level: LogLevel) => void

export interface LoggerConfig {
  enabled: boolean
  /** Lines below this level are dropped. */
  minLevel: LogLevel
  showTimestamp: boolean
  /** date-fns pattern; `null` renders ISO-8601. */
  timestampFormat: string | null
  colors: boolean
  /** Every emitted line is also appended here, uncoloured. */
  outputFile?: string
  sink: LogSink
  now: () => Date
}

export const consoleSink: LogSink = (line, level) => {
  if (level === 'error') console.error(line)
  else if (level === 'warning') console.warn(line)
  else console.log(line)
}

const DEFAULT_CONFIG: LoggerConfig = {
  enabled: true,
  minLevel: 'debug',
  showTimestamp: true,
  timestampFormat: 'HH:mm:ss',
  colors: true,
  sink: consoleSink,
  now: () => new Date(),
}

function paletteFor(chalk: ChalkInstance): Record<LogLevel, (text: string) => string> {
  return {
    debug: chalk.magenta,
    info: chalk.cyan,
    success: chalk.green,
    warning: chalk.yellow,
    error: chalk.red,
  }
}

/**
 * Leveled console logger. Each call writes at most one line, synchronously.
 */
export class Logger {
  private settings: LoggerConfig
  private palette: Record<LogLevel, (text: string) => string>

  constructor(config: Partial<LoggerConfig> = {}) {
    this.settings = { ...DEFAULT_CONFIG, ...config }
    this.palette = paletteFor(new Chalk({ level: this.settings.colors ? 1 : 0 }))
  }

  get config(): Readonly<LoggerConfig> {
    return Object.freeze({ ...this.settings })
  }

  configure(changes: Partial<LoggerConfig>): void {
    this.settings = { ...this.settings, ...changes }
    if (changes.colors !== undefined) {
      this.palette = paletteFor(new Chalk({ level: changes.colors ? 1 : 0 }))
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.settings.enabled && SEVERITY[level] >= SEVERITY[this.settings.minLevel]
  }

  log(level: LogLevel, message: string): void {
    if (!this.isLevelEnabled(level)) return

    const plain = this.render(level, message)
    this.settings.sink(this.palette[level](plain), level)
    if (this.settings.outputFile) this.appendToFile(this.settings.outputFile, plain)
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  success(message: string): void {
    this.log('success', message)
  }

  warning(message: string): void {
    this.log('warning', message)
  }

  error(message: string): void {
    this.log('error', message)
  }

  private render(level: LogLevel, message: string): string {
    const prefix = this.settings.showTimestamp ? `[${this.timestamp()}] ` : ''
    return `${prefix}[${level.toUpperCase()}] ${message}`
  }

  private timestamp(): string {
    const now = this.settings.now()
    const pattern = this.settings.timestampFormat
    if (pattern === null) return now.toISOString()
    try {
      return formatDate(now, pattern)
    } catch {
      return now.toISOString()
    }
  }

  private appendToFile(path: string, line: string) {
    try {
      fs.appendFileSync(path, `${line}\n`)
    } catch (err) {
      this.settings = { ...this.settings, outputFile: undefined }
      // Straight to the sink: the warning is reported whatever minLevel is.
      const warning = this.render('warning', `Log file ${path} disabled: ${errorMessage(err)}`)
      this.settings.sink(this.palette.warning(warning), 'warning')
    }
  }
}

export const logger = new Logger()
