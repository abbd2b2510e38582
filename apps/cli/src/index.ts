#!/usr/bin/env node
/**
 * tracktap - playlist automation for a single streaming account
 */

import {createCommandContext, runCli} from './cli/runCli'
import {loadEnv} from './config/env'

async function main(): Promise<number> {
  const env = loadEnv()
  return runCli(process.argv.slice(2), env, createCommandContext(env))
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  })
