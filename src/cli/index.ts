#!/usr/bin/env node
/**
 * cfgtree CLI - Main entry point
 * Provides the `cfgtree` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerGetCommand } from './commands/get.js'
import { registerHasCommand } from './commands/has.js'
import { registerSetCommand } from './commands/set.js'
import { registerFormatsCommand } from './commands/formats.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  // Run from dist/cli or src/cli
  const paths = [
    resolve(__dirname, '../../package.json'),
    resolve(__dirname, '../package.json'),
  ]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'cfgtree') {
        return pkg.version ?? '0.0.0'
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('cfgtree')
    .description('cfgtree - Query and update JSON and YAML config files by dotted path')
    .version(version, '-v, --version', 'Output the current version')

  registerGetCommand(program)
  registerHasCommand(program)
  registerSetCommand(program)
  registerFormatsCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
