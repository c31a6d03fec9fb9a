/**
 * Add command - Add a plugin to plugins.toml.
 *
 * Exactly one source flag is required; the rest map one-to-one onto the
 * plugin table's keys.
 */

import { resolve } from 'node:path'

import { type Command, Option } from 'commander'

import { ConfigError, type RawPlugin, add } from 'plush-config'

import { getContext } from '../helpers.js'

/** Options parsed from the add command line */
export interface AddOptions {
  github?: string | undefined
  gist?: string | undefined
  git?: string | undefined
  remote?: string | undefined
  local?: string | undefined
  inline?: string | undefined
  proto?: string | undefined
  branch?: string | undefined
  tag?: string | undefined
  rev?: string | undefined
  use?: string[] | undefined
  apply?: string[] | undefined
  profiles?: string[] | undefined
  pre?: string | undefined
  post?: string | undefined
}

const PROTOCOLS = ['https', 'ssh', 'git'] as const

type Protocol = (typeof PROTOCOLS)[number]

function isProtocol(value: string): value is Protocol {
  return PROTOCOLS.some((proto) => proto === value)
}

/**
 * Turn command line options into a plugin table.
 *
 * Relative `--local` paths are resolved against `cwd`.
 *
 * @throws ConfigError for an unknown protocol
 */
export function buildRawPlugin(options: AddOptions, cwd: string = process.cwd()): RawPlugin {
  const plugin: RawPlugin = {}

  if (options.github !== undefined) plugin.github = options.github
  if (options.gist !== undefined) plugin.gist = options.gist
  if (options.git !== undefined) plugin.git = options.git
  if (options.remote !== undefined) plugin.remote = options.remote
  if (options.local !== undefined) plugin.local = resolve(cwd, options.local)
  if (options.inline !== undefined) plugin.inline = options.inline

  if (options.proto !== undefined) {
    if (!isProtocol(options.proto)) {
      throw new ConfigError(`Unknown protocol "${options.proto}"`, 'command line')
    }
    plugin.proto = options.proto
  }

  if (options.branch !== undefined) plugin.branch = options.branch
  if (options.tag !== undefined) plugin.tag = options.tag
  if (options.rev !== undefined) plugin.rev = options.rev
  if (options.use !== undefined) plugin.use = options.use
  if (options.apply !== undefined) plugin.apply = options.apply
  if (options.profiles !== undefined) plugin.profiles = options.profiles

  if (options.pre !== undefined || options.post !== undefined) {
    plugin.hooks = {}
    if (options.pre !== undefined) plugin.hooks.pre = options.pre
    if (options.post !== undefined) plugin.hooks.post = options.post
  }

  return plugin
}

export function registerAddCommand(program: Command): void {
  program
    .command('add')
    .description('Add a plugin to the config file')
    .argument('<name>', 'Plugin name')
    .option('--github <repo>', 'GitHub repository (owner/repo)')
    .option('--gist <id>', 'GitHub gist')
    .option('--git <url>', 'Git repository URL')
    .option('--remote <url>', 'Single file download URL')
    .option('--local <path>', 'Local directory or file')
    .option('--inline <script>', 'Inline script text')
    .addOption(new Option('--proto <proto>', 'Protocol for --github and --gist').choices(PROTOCOLS))
    .option('--branch <name>', 'Git branch to track')
    .option('--tag <name>', 'Git tag to check out')
    .option('--rev <sha>', 'Git commit to check out')
    .option('--use <patterns...>', 'Glob patterns selecting files')
    .option('--apply <templates...>', 'Templates to apply')
    .option('--profiles <names...>', 'Profiles the plugin is enabled for')
    .option('--pre <script>', 'Script emitted before the plugin')
    .option('--post <script>', 'Script emitted after the plugin')
    .action(async (name: string, options: AddOptions, command: Command) => {
      await add(getContext(command), name, buildRawPlugin(options))
    })
}
