/**
 * Init command - Create a plugins.toml for a shell.
 */

import { Argument, type Command } from 'commander'

import { ConfigError, SHELLS, init, isShell } from 'plush-config'

import { getContext } from '../helpers.js'

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a new config file')
    .addArgument(new Argument('[shell]', 'Shell to configure').choices(SHELLS).default('zsh'))
    .action(async (shell: string, _options: object, command: Command) => {
      const ctx = getContext(command)
      if (!isShell(shell)) {
        throw new ConfigError(`Unsupported shell "${shell}"`, ctx.configFile)
      }
      await init(ctx, shell)
    })
}
