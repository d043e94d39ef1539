/**
 * CLI Argument Parsing
 *
 * Uses commander for declarative command and option definitions. Every
 * registered bond function becomes a subcommand named after its command;
 * `config` manages the persistent settings file.
 */

import { Command } from 'commander'
import { type FunctionDescriptor, FUNCTION_REGISTRY, type FunctionName } from '../functions'
import { VERSION } from '../version'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: 'run' | 'config' | 'help'
  /** Function behind a `run` command */
  functionName: FunctionName | undefined
  /** Positional arguments for the function, as typed */
  functionArgs: string[]
  quiet: boolean
  verbose: boolean
  /** Wait for background resolution instead of printing progress */
  wait: boolean
  configFile: string | undefined
  apiUrl: string | undefined
  configAction: ConfigAction
  configKey: string | undefined
  configValue: string | undefined
}

const DESCRIPTION = `Government bond reference data from the command line.

Lookups go through a local cache; a bond the service is still searching for
prints its progress (⏳) unless --wait is given.

Examples:
  bondref static GB00BYZW3G56 coupon
  bondref info GB00BYZW3G56 true
  bondref list GB NOMINAL 20
  bondref search country DE currency EUR
  bondref years-to-maturity US912810TM09 --wait
  bondref reference fields`

function argumentSpec(descriptor: FunctionDescriptor): string[] {
  return descriptor.args.map((arg) => {
    const name = arg.variadic ? `${arg.name}...` : arg.name
    return arg.optional || arg.variadic ? `[${name}]` : `<${name}>`
  })
}

function addFunctionCommand(program: Command, descriptor: FunctionDescriptor): void {
  const command = program.command(descriptor.command).description(descriptor.summary)
  const specs = argumentSpec(descriptor)
  for (const [index, arg] of descriptor.args.entries()) {
    command.argument(specs[index] ?? arg.name, arg.description)
  }
  if (descriptor.lookup) {
    command.option('-w, --wait', 'Wait until the service has finished searching')
  }
}

/**
 * Create the commander program with all commands.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('bondref')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set BONDREF_CONFIG env var)')
    .option('--api-url <url>', 'Bond data service URL (overrides config and BONDREF_API_URL)')
    .helpOption('-h, --help', 'Show this help message')

  for (const descriptor of FUNCTION_REGISTRY) {
    addFunctionCommand(program, descriptor)
  }

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  bondref config                                   List current settings
  bondref config set apiUrl http://127.0.0.1:8000  Point at a local service
  bondref config set maxPollAttempts 8             Poll longer before giving up
  bondref config unset apiKey                      Remove the stored API key`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(opts: Record<string, unknown>): CLIArgs {
  return {
    command: 'help',
    functionName: undefined,
    functionArgs: [],
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    wait: opts.wait === true,
    configFile: optionalString(opts.configFile),
    apiUrl: optionalString(opts.apiUrl),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture the parsed arguments.
 * optsWithGlobals() includes the global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const descriptor of FUNCTION_REGISTRY) {
    const cmd = program.commands.find((c) => c.name() === descriptor.command)
    if (!cmd) continue
    cmd.action(() => {
      onParsed({
        ...buildCLIArgs(cmd.optsWithGlobals()),
        command: 'run',
        functionName: descriptor.name,
        functionArgs: [...cmd.args]
      })
    })
  }

  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      onParsed({
        ...buildCLIArgs(configCmd.optsWithGlobals()),
        command: 'config',
        configAction: parseConfigAction(action),
        configKey: key,
        configValue: value
      })
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  const parsed: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    parsed.args = args
  })

  program.parse()

  return parsed.args ?? program.help()
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    for (const cmd of program.commands) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    }
  }

  const parsed: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    parsed.args = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and usage errors
    if (!exitOnHelp) {
      return buildCLIArgs({})
    }
    throw error
  }

  return parsed.args ?? buildCLIArgs({})
}
