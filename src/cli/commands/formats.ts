/**
 * `cfgtree formats` — list the built-in format backends in match order
 */

import type { Command } from 'commander'
import { createDefaultBackendRegistry } from '../../backends/backend-registry.js'
import { buildFormatRows, formatFormatTable } from '../utils/formatting.js'

export function runFormats(opts: { json?: boolean } = {}): number {
  const rows = buildFormatRows(createDefaultBackendRegistry())
  if (opts.json) {
    process.stdout.write(`${JSON.stringify(rows, null, 2)}\n`)
  } else {
    process.stdout.write(formatFormatTable(rows))
  }
  return 0
}

/**
 * Register the `formats` command on a Commander program.
 */
export function registerFormatsCommand(program: Command): void {
  program
    .command('formats')
    .description('List supported config formats and the filenames they match')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      process.exitCode = runFormats(opts)
    })
}
