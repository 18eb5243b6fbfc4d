/**
 * Configuration module exports
 */

// Defaults
export {
  DEFAULT_CONFIG,
  DEFAULT_GIT_TIMEOUT_SECONDS,
  DEFAULT_HTTP_TIMEOUT_SECONDS,
  deepMerge,
  type RawConfig,
} from "./defaults";
// Environment
export { type Env, EnvReader, envTrue, ignoredEnvSettings, loadConfigFromEnv } from "./env";
// Inline
export {
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findConfigFile,
  type LoadConfigOptions,
  loadConfig,
  loadConfigFile,
  parseConfigContent,
} from "./loader";
// Validator
export { ConfigError, isRecord, validateConfig } from "./validator";
