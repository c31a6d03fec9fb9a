/**
 * plush - command line interface.
 *
 * A thin argument parsing layer over plush-config. Commands write
 * progress to stderr; only `source` writes to stdout.
 */

import chalk from 'chalk'
import { Command } from 'commander'

import { isConfigError, isPlushError } from 'plush-config'

import { registerAddCommand } from './commands/add.js'
import { registerInitCommand } from './commands/init.js'
import { registerLockCommand } from './commands/lock.js'
import { registerRemoveCommand } from './commands/remove.js'
import { registerSourceCommand } from './commands/source.js'
import { registerGlobalOptions } from './helpers.js'

export { buildRawPlugin, type AddOptions } from './commands/add.js'
export { formatEvent } from './ui.js'

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isPlushError(error)) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    if (isConfigError(error)) {
      lines.push(chalk.gray(`  in ${error.source}`))
    }
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = registerGlobalOptions(
    new Command().name('plush').description('Declarative shell plugin manager').version('0.1.0')
  )

  registerInitCommand(program)
  registerAddCommand(program)
  registerRemoveCommand(program)
  registerLockCommand(program)
  registerSourceCommand(program)

  return program
}

/**
 * Main entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(argv)
  } catch (error) {
    console.error(formatError(error))
    process.exit(1)
  }
}
