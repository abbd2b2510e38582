/**
 * Catalog call wrapper
 *
 * Calls run one at a time and are never retried. The wrapper only times each
 * call and logs failures with the remote status and a classification note.
 */

import {describeRemoteFailure} from '@tracktap/catalog-client'
import {z} from 'zod'

import {getLogger} from './LoggerContext'

// Error details schema for structured error logging
const ErrorDetailsSchema = z.object({
  context: z.string(),
  message: z.string().optional(),
  name: z.string().optional(),
  note: z.string(),
  retryAfter: z.number().optional(),
  status: z.number().optional(),
})

type ErrorDetails = z.infer<typeof ErrorDetailsSchema>

const ErrorWithRetryAfterSchema = z.object({retryAfter: z.number()})

/**
 * Wrap a remote catalog call with timing and failure logging
 */
export async function catalogCall<T>(call: () => Promise<T>, context: string): Promise<T> {
  const logger = getLogger()
  const start = performance.now()
  try {
    logger?.debug(`Catalog call starting: ${context}`)
    const result = await call()
    const duration = performance.now() - start
    logger?.debug(`Catalog call completed in ${duration.toFixed(0)}ms: ${context}`)
    return result
  } catch (error) {
    const duration = performance.now() - start
    logger?.error(`Catalog call failed after ${duration.toFixed(0)}ms`, error, buildErrorDetails(error, context))
    throw error
  }
}

export function buildErrorDetails(error: unknown, context: string): ErrorDetails {
  const {note, status} = describeRemoteFailure(error)
  const details: ErrorDetails = {context, note}

  if (error instanceof Error) {
    details.message = error.message
    details.name = error.name
  }

  if (status !== null) {
    details.status = status
  }

  const retry = ErrorWithRetryAfterSchema.safeParse(error)
  if (retry.success) {
    details.retryAfter = retry.data.retryAfter
  }

  return ErrorDetailsSchema.parse(details)
}
