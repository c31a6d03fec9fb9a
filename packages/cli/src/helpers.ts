/**
 * Shared CLI helpers: global options and context construction.
 */

import type { Command } from 'commander'
import type { Ora } from 'ora'

import { type Context, type ContextOptions, createContext } from 'plush-config'

import { eventPrinter } from './ui.js'

/**
 * Options accepted by every command (declared on the program).
 */
export type GlobalOptions = {
  configDir?: string | undefined
  dataDir?: string | undefined
  configFile?: string | undefined
  profile?: string | undefined
  verbose?: boolean | undefined
}

/**
 * Register the global options on the program.
 */
export function registerGlobalOptions(program: Command): Command {
  return program
    .option('--config-dir <path>', 'Config directory (env: PLUSH_CONFIG_DIR)')
    .option('--data-dir <path>', 'Data directory (env: PLUSH_DATA_DIR)')
    .option('-c, --config-file <path>', 'Config file (env: PLUSH_CONFIG_FILE)')
    .option('-p, --profile <name>', 'Active profile (env: PLUSH_PROFILE)')
    .option('-v, --verbose', 'Show per-source progress')
}

/**
 * Build an operation context from a command's options, merged with the
 * program's global options. Events print to stderr, around `spinner`
 * when one is given.
 */
export function getContext(
  command: Command,
  overrides: Omit<ContextOptions, keyof GlobalOptions | 'onEvent'> = {},
  spinner?: Ora
): Context {
  const globals = command.optsWithGlobals<GlobalOptions>()
  return createContext({
    ...overrides,
    configDir: globals.configDir,
    dataDir: globals.dataDir,
    configFile: globals.configFile,
    profile: globals.profile,
    onEvent: eventPrinter({ verbose: globals.verbose }, spinner),
  })
}
