import pino from 'pino'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Before using the logger, it must be initialized with `init()` at the top of the entry point file of a program.
 * Until then messages go to the console, filtered by the same level.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: this.level,
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'trace', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): string {
    return process.env['LOG_LEVEL'] || 'info'
  }

  init() {
    this.pino.level = this.level
    this.pino.debug('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  isLevelEnabled(level: LogLevel): boolean {
    const threshold = LEVEL_ORDER[this.level] ?? LEVEL_ORDER['info']
    return LEVEL_ORDER[level] >= threshold
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  /**
   * Falls back to the console when the logger is not initialized
   */
  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.isLevelEnabled(level)) {
      return
    }

    if (!this.hasBeenInitialized) {
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
