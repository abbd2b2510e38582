/**
 * CLI entry logic shared by the binary and its tests
 */

import {createInterface} from 'node:readline/promises'

import {OAuthTokenProvider, SpotifyCatalogClient} from '@tracktap/catalog-client'

import {ConfigStore} from '../config/ConfigStore'
import type {CliEnv} from '../config/env'
import {FileTokenStore} from '../config/FileTokenStore'
import {getLogger, runWithLogger} from '../utils/LoggerContext'
import {ServiceLogger} from '../utils/ServiceLogger'
import {type CommandContext, EXIT_CODES, runCommand} from './commands'
import {CliUsageError, parseArguments, USAGE} from './parseArguments'

async function promptLine(question: string): Promise<string> {
  const rl = createInterface({input: process.stdin, output: process.stdout})
  try {
    return await rl.question(question)
  } finally {
    rl.close()
  }
}

export function createCommandContext(env: CliEnv): CommandContext {
  const tokenStore = new FileTokenStore(env.TRACKTAP_TOKEN_CACHE)
  return {
    configStore: new ConfigStore(env.TRACKTAP_CONFIG),
    createCatalog: config =>
      new SpotifyCatalogClient(
        new OAuthTokenProvider(
          {clientId: config.client_id, clientSecret: config.client_secret, redirectUri: config.redirect_uri},
          tokenStore,
        ),
      ),
    out: line => console.log(line),
    prompt: promptLine,
    tokenStore,
  }
}

/**
 * Parse argv, run the command inside a logger context and map failures to exit codes
 */
export async function runCli(argv: readonly string[], env: CliEnv, context: CommandContext): Promise<number> {
  const logger = new ServiceLogger('tracktap', env.LOG_LEVEL)

  return runWithLogger(logger, async () => {
    try {
      return await runCommand(parseArguments(argv), context)
    } catch (error) {
      if (error instanceof CliUsageError) {
        context.out(`${error.message}\n\n${USAGE}`)
        return EXIT_CODES.USAGE
      }
      getLogger()?.error('Command failed', error)
      context.out(`Error: ${error instanceof Error ? error.message : String(error)}`)
      return EXIT_CODES.FAILURE
    }
  })
}
