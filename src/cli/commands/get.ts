/**
 * `cfgtree get <file> <paths...>` — print a value from a config file
 *
 * Several paths form a chain: the first one that resolves is printed.
 */

import type { Command } from 'commander'
import { CfgtreeError } from '../../core/errors.js'
import type { GetOptions } from '../../modules/config-accessor/config-accessor.js'
import { createConfigAccessor } from '../../modules/config-accessor/config-accessor-impl.js'
import { createLogger } from '../../utils/logger.js'
import { coerceValue, formatValue } from '../utils/formatting.js'

const logger = createLogger('get-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const GET_EXIT_SUCCESS = 0
export const GET_EXIT_ABSENT = 1
export const GET_EXIT_ERROR = 2

// ---------------------------------------------------------------------------
// `get` action
// ---------------------------------------------------------------------------

export interface GetCommandOptions {
  /** Raw default value, coerced like `set` values */
  default?: string
  required?: boolean
  json?: boolean
}

export function runGet(file: string, paths: string[], opts: GetCommandOptions = {}): number {
  const getOptions: GetOptions = {
    ...(opts.default !== undefined && { default: coerceValue(opts.default) }),
    ...(opts.required === true && { required: true }),
  }

  try {
    const config = createConfigAccessor({ filename: file, ro: true })
    const value = config.get(paths, getOptions)
    if (value === undefined) {
      return GET_EXIT_ABSENT
    }
    process.stdout.write(formatValue(value, opts.json ? 'json' : 'text'))
    return GET_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof CfgtreeError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return GET_EXIT_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to read configuration value')
    process.stderr.write(`  Error reading configuration: ${message}\n`)
    return GET_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

/**
 * Register the `get` command on a Commander program.
 */
export function registerGetCommand(program: Command): void {
  program
    .command('get <file> <paths...>')
    .description('Print the first of the dotted paths that exists (e.g. companies.acme.users.0.name)')
    .option('--default <value>', 'Value to print when no path resolves')
    .option('--required', 'Fail when no path resolves and no default is given')
    .option('--json', 'Print the value as JSON')
    .action((file: string, paths: string[], opts: GetCommandOptions) => {
      process.exitCode = runGet(file, paths, opts)
    })
}
