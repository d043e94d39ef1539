/**
 * Run Command
 *
 * Invokes one bond function against a fresh context and prints its result.
 * Settings layer, lowest first: defaults, config file, environment, flags.
 */

import { BondContext, type BondContextOptions } from '../../context'
import { createBondFunctions, invokeFunction } from '../../functions'
import type { Logger } from '../../logger'
import { createTimerScheduler } from '../../lookup'
import { type SettingsLayer, resolveSettings, settingsFromEnv } from '../../settings'
import type { CellResult, ClientSettings } from '../../types'
import type { CLIArgs } from '../args'
import { configToSettings, loadConfig } from '../config'
import { formatResult } from '../output'

/** Collaborators a test can substitute */
export type RunOverrides = Pick<BondContextOptions, 'transport' | 'scheduler' | 'clock'> & {
  readonly env?: NodeJS.ProcessEnv
  /** Where the result goes (default: stdout, even with --quiet) */
  readonly print?: (text: string) => void
}

function printToStdout(text: string): void {
  process.stdout.write(`${text}\n`)
}

export async function buildSettings(
  args: CLIArgs,
  env: NodeJS.ProcessEnv = process.env
): Promise<ClientSettings> {
  const fromFile = configToSettings(await loadConfig(args.configFile))
  const fromFlags: SettingsLayer = { baseUrl: args.apiUrl }
  return resolveSettings(fromFile, settingsFromEnv(env), fromFlags)
}

/**
 * Execute a function command. Returns the result so the caller can pick an
 * exit code.
 */
export async function cmdRun(
  args: CLIArgs,
  logger: Logger,
  overrides: RunOverrides = {}
): Promise<CellResult> {
  if (!args.functionName) {
    throw new Error('No function given')
  }

  const context = BondContext.open({
    settings: await buildSettings(args, overrides.env),
    logger,
    transport: overrides.transport,
    clock: overrides.clock,
    // Referenced timers keep the process alive while --wait polls
    scheduler: overrides.scheduler ?? createTimerScheduler(logger, { unref: !args.wait })
  })

  try {
    const functions = createBondFunctions(context, { wait: args.wait, clock: overrides.clock })
    logger.verbose(`${args.functionName}(${args.functionArgs.join(', ')})`)
    const result = await invokeFunction(functions, args.functionName, args.functionArgs)
    const print = overrides.print ?? printToStdout
    print(formatResult(result))
    return result
  } finally {
    await context.close()
  }
}
