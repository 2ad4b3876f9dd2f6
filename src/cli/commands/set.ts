/**
 * `cfgtree set <file> <key> <value>` — update a top-level key and save
 *
 * The value is coerced: true/false/null and numbers become typed values,
 * anything else is stored as a string.
 */

import type { Command } from 'commander'
import { CfgtreeError } from '../../core/errors.js'
import { createConfigAccessor } from '../../modules/config-accessor/config-accessor-impl.js'
import { createLogger } from '../../utils/logger.js'
import { coerceValue } from '../utils/formatting.js'

const logger = createLogger('set-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const SET_EXIT_SUCCESS = 0
/** Any failure: bad input, unreadable or undecodable file, refused write */
export const SET_EXIT_ERROR = 2

// ---------------------------------------------------------------------------
// `set` action
// ---------------------------------------------------------------------------

export interface SetCommandOptions {
  compact?: boolean
}

export function runSet(
  file: string,
  key: string,
  rawValue: string,
  opts: SetCommandOptions = {}
): number {
  if (!key || key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return SET_EXIT_ERROR
  }

  const value = coerceValue(rawValue)

  try {
    const config = createConfigAccessor({
      filename: file,
      rw: true,
      compact: opts.compact ?? false,
    })
    config.set(key, value)
    config.save()
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return SET_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof CfgtreeError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return SET_EXIT_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to update configuration')
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return SET_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

/**
 * Register the `set` command on a Commander program.
 */
export function registerSetCommand(program: Command): void {
  program
    .command('set <file> <key> <value>')
    .description('Set a top-level key and save the file (e.g. set app.json name acme)')
    .option('--compact', 'Write dense output for formats that support it')
    .action((file: string, key: string, value: string, opts: SetCommandOptions) => {
      process.exitCode = runSet(file, key, value, opts)
    })
}
