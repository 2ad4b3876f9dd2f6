/**
 * `cfgtree has <file> <key>` — report whether a top-level key exists
 */

import type { Command } from 'commander'
import { CfgtreeError } from '../../core/errors.js'
import { createConfigAccessor } from '../../modules/config-accessor/config-accessor-impl.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('has-cmd')

export const HAS_EXIT_PRESENT = 0
export const HAS_EXIT_ABSENT = 1
export const HAS_EXIT_ERROR = 2

export function runHas(file: string, key: string): number {
  try {
    const config = createConfigAccessor({ filename: file, ro: true })
    const present = config.has(key)
    process.stdout.write(`${String(present)}\n`)
    return present ? HAS_EXIT_PRESENT : HAS_EXIT_ABSENT
  } catch (err) {
    if (err instanceof CfgtreeError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return HAS_EXIT_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to check configuration key')
    process.stderr.write(`  Error reading configuration: ${message}\n`)
    return HAS_EXIT_ERROR
  }
}

/**
 * Register the `has` command on a Commander program.
 */
export function registerHasCommand(program: Command): void {
  program
    .command('has <file> <key>')
    .description('Check whether a top-level key exists')
    .action((file: string, key: string) => {
      process.exitCode = runHas(file, key)
    })
}
