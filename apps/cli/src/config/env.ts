/**
 * Environment variables read by the CLI
 */

import {z} from 'zod'

import {DEFAULT_FILES} from '../constants'

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'error', 'info', 'warn']).default('warn'),
  TRACKTAP_CONFIG: z.string().min(1).default(DEFAULT_FILES.CONFIG),
  TRACKTAP_TOKEN_CACHE: z.string().min(1).default(DEFAULT_FILES.TOKEN_CACHE),
})

export type CliEnv = z.infer<typeof EnvSchema>

export function loadEnv(source: Record<string, string | undefined> = process.env): CliEnv {
  return EnvSchema.parse(source)
}
