export { loadConfig, validateConfig, type LoadConfigOptions, CONFIG_FILENAMES } from './load'
export { ConfigValidationError, ConfigLoadError, type ConfigSource } from './errors'
