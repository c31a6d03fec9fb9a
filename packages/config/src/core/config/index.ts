/**
 * Config file (plugins.toml) parsing and editing
 */

export {
  CONFIG_FILENAME,
  addRawPlugin,
  createDefaultRawConfig,
  loadConfig,
  normalizeConfig,
  parseConfigToml,
  parseRawConfig,
  readRawConfig,
  removeRawPlugin,
  serializeConfigToml,
  type ConfigWarning,
  type LoadConfigOptions,
  type LoadedConfig,
} from './plugins-toml.js'
