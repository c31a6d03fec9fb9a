/**
 * Lock command - Install every plugin and write the lock file.
 *
 * Any plugin failure fails the command; the previous lock file is kept.
 */

import type { Command } from 'commander'

import { lock } from 'plush-config'

import { getContext } from '../helpers.js'
import { createSpinner, formatDuration } from '../ui.js'

interface LockOptions {
  reinstall?: boolean | undefined
}

export function registerLockCommand(program: Command): void {
  program
    .command('lock')
    .description('Install plugins and write the lock file')
    .option('--reinstall', 'Remove cached clones and downloads first')
    .action(async (options: LockOptions, command: Command) => {
      const spinner = createSpinner('Installing plugins...')
      const ctx = getContext(command, { reinstall: options.reinstall }, spinner)
      const started = Date.now()

      spinner.start()
      try {
        await lock(ctx)
      } finally {
        spinner.stop()
      }
      console.error(`  done in ${formatDuration(Date.now() - started)}`)
    })
}
