/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
// Example
export { EXAMPLE_CONFIG, renderExampleConfig } from "./example";
// Inline flags
export { hasProviderFlags, PROVIDER_FLAG_OPTIONS, providerConfigFromFlags } from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export type { Environment, ResolveOptions } from "./resolver";
export {
  extractPasswordFromDatabaseUrl,
  readPasswordFromEnvFile,
  resolveConfig,
  resolveProviderConfig,
} from "./resolver";
// Validator
export { MAX_COMPRESSION_LEVEL, MIN_COMPRESSION_LEVEL, validateConfig } from "./validator";
