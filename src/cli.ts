#!/usr/bin/env node
/**
 * bondref CLI
 *
 * Runs one bond function per invocation against the configured service and
 * prints the cell or table it returns.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdRun } from './cli/commands/run'
import { isErrorText } from './errors'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'run': {
        const result = await cmdRun(args, logger)
        if (isErrorText(result)) {
          process.exitCode = 1
        }
        break
      }

      case 'config':
        await cmdConfig(args, logger)
        break

      case 'help':
        logger.error("No command given. Run 'bondref --help' for usage.")
        process.exitCode = 1
        break
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
