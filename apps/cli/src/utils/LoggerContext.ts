/**
 * LoggerContext - AsyncLocalStorage-based context for ServiceLogger
 *
 * Provides a per-command logger without explicit parameter passing.
 */

import {AsyncLocalStorage} from 'node:async_hooks'
import {z} from 'zod'

import {ServiceLogger} from './ServiceLogger'

interface LoggerContext {
  logger: ServiceLogger
}

const LoggerContextSchema = z.object({
  logger: z.instanceof(ServiceLogger),
})

const loggerStorage = new AsyncLocalStorage<LoggerContext>()

/**
 * Get a child logger with additional context
 * Throws if called outside of a logger context
 */
export function getChildLogger(subContext: string): ServiceLogger {
  const logger = getLogger()
  if (!logger) {
    throw new Error('getChildLogger called outside of logger context')
  }
  return logger.child(subContext)
}

/**
 * Get the current command's logger
 * Returns undefined if called outside of a logger context
 */
export function getLogger(): undefined | ServiceLogger {
  const validation = LoggerContextSchema.safeParse(loggerStorage.getStore())
  if (!validation.success) {
    return undefined
  }
  return validation.data.logger
}

/**
 * Initialize logger context for a command scope
 * Must be called with async/await (not thenables) to ensure context preservation
 */
export async function runWithLogger<T>(logger: ServiceLogger, fn: () => Promise<T>): Promise<T> {
  const context: LoggerContext = {logger}
  return await loggerStorage.run(context, fn)
}
