import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

export interface LoggerInitOptions {
  /**
   * Send records below `error` to stderr as well, leaving stdout to the
   * program's own output
   */
  stderrOnly?: boolean
}

/**
 * Records below `error` go to `infoStream`, `error` and `fatal` to stderr.
 * `dedupe` hands each record to the highest matching stream only.
 */
function createPino(level: string, infoStream: NodeJS.WritableStream) {
  return pino(
    { level },
    pino.multistream(
      [
        { level: 'debug', stream: infoStream },
        { level: 'error', stream: process.stderr },
      ],
      { dedupe: true },
    ),
  )
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call `init()` at the top of a program's entry point; until then
 * messages fall back to timestamped console output.
 */
export class LoggerProvider {
  private pino = createPino(this.level, process.stdout)
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level() {
    return process.env['LOG_LEVEL'] || 'info'
  }

  init(options: LoggerInitOptions = {}) {
    if (options.stderrOnly) {
      this.pino = createPino(this.level, process.stderr)
    }
    this.pino.debug('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  info(message: string, ...args: unknown[]) {
    this._log('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._log('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._log('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._log('error', message, [error, ..._args])
  }

  private _log(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.pino.isLevelEnabled(level)) return

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
