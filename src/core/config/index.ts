export { loadConfig, configFromEnv, CONFIG_FILENAME, DEFAULT_ENV_PREFIX } from './load'
export type { LoadConfigOptions } from './load'
export { default as validateConfig } from './validate'
export { ConfigurationError, ConfigValidationError, ConfigLoadError } from './errors'
