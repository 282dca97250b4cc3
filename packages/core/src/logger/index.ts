import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description !IMPORTANT! Call `init()` at the top of the entry point of a process; until then messages go to the console.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: this.level,
      base: { component: 'evm-registry' },
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'debug', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): string {
    return process.env['PINO_LEVEL'] || process.env['LOG_LEVEL'] || 'info'
  }

  init() {
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
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

  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.isConsoleLevelEnabled(level)) return
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
      this.pino.error(
        { err: args[0], args: args.slice(1).map(stringifyBigints) },
        message,
      )
    } else {
      this.pino[level]({ args: args.map(stringifyBigints) }, message)
    }
  }

  private isConsoleLevelEnabled(level: LogLevel): boolean {
    const order: Record<string, number> = {
      trace: 0,
      debug: 1,
      info: 2,
      warn: 3,
      error: 4,
      fatal: 5,
      silent: 6,
    }
    return (order[level] ?? 0) >= (order[this.level] ?? 2)
  }
}

// addresses read better as hex than as decimal strings
function stringifyBigints(value: unknown): unknown {
  if (typeof value === 'bigint') return `0x${value.toString(16)}`
  if (Array.isArray(value)) return value.map(stringifyBigints)
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, stringifyBigints(v)]),
    )
  }
  return value
}

export const logger = new LoggerProvider()
