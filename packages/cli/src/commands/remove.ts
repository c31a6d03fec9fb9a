/**
 * Remove command - Delete a plugin from plugins.toml.
 */

import type { Command } from 'commander'

import { remove } from 'plush-config'

import { getContext } from '../helpers.js'

export function registerRemoveCommand(program: Command): void {
  program
    .command('remove')
    .description('Remove a plugin from the config file')
    .argument('<name>', 'Plugin name')
    .action(async (name: string, _options: object, command: Command) => {
      await remove(getContext(command), name)
    })
}
