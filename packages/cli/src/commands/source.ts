/**
 * Source command - Print the shell script for `eval "$(plush source)"`.
 *
 * Best-effort: failed plugins are reported on stderr and the script is
 * built from the rest.
 */

import type { Command } from 'commander'

import { source } from 'plush-config'

import { getContext } from '../helpers.js'

interface SourceOptions {
  reinstall?: boolean | undefined
  relock?: boolean | undefined
}

export function registerSourceCommand(program: Command): void {
  program
    .command('source')
    .description('Print the script that loads every plugin')
    .option('--relock', 'Ignore the lock file and resolve again')
    .option('--reinstall', 'Remove cached clones and downloads first')
    .action(async (options: SourceOptions, command: Command) => {
      const ctx = getContext(command, { reinstall: options.reinstall, relock: options.relock })
      process.stdout.write(await source(ctx))
    })
}
