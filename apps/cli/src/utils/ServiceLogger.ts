/**
 * ServiceLogger - Centralized logging for services
 *
 * Every line goes to stderr so stdout carries only command output.
 * Messages below the configured threshold are dropped.
 */

export type LogLevel = 'debug' | 'error' | 'info' | 'warn'

type LogData = Record<string, unknown>

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  error: 40,
  info: 20,
  warn: 30,
}

export class ServiceLogger {
  private minLevel: LogLevel
  private serviceName: string

  constructor(serviceName: string, minLevel: LogLevel = 'warn') {
    this.serviceName = serviceName
    this.minLevel = minLevel
  }

  /**
   * Create a child logger with a sub-context
   */
  child(subContext: string): ServiceLogger {
    return new ServiceLogger(`${this.serviceName}:${subContext}`, this.minLevel)
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data)
  }

  /**
   * Log an error message, unpacking Error instances into the data payload
   */
  error(message: string, error?: unknown, data?: LogData): void {
    const errorData =
      error instanceof Error
        ? {error: error.message, ...data}
        : error === undefined
          ? {...data}
          : {error: String(error), ...data}
    this.log('error', message, errorData)
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data)
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel]
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data)
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) {
      return
    }

    const formattedMessage = `[${this.serviceName}] ${message}`
    const consoleMethod = level === 'warn' ? console.warn : console.error
    if (data && Object.keys(data).length > 0) {
      consoleMethod(formattedMessage, data)
    } else {
      consoleMethod(formattedMessage)
    }
  }
}
