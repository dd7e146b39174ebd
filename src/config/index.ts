/**
 * Config module exports
 */

export { deepMerge, defaultBackupPath, getDefaultConfig } from "./defaults";
export {
  CONFIG_FLAG_OPTIONS,
  CONFIG_FLAGS_HELP,
  type ConfigOverrides,
  EVENT_SINK_TYPES,
  extractOverrides,
  isEventSinkType,
  MAX_RETENTION_DAYS,
  MAX_TIMEOUT_SECONDS,
  parseWholeNumber,
} from "./inline";
export {
  CONFIG_FILE_NAMES,
  findConfigFile,
  loadConfigFile,
  parseConfigContent,
  type ResolveConfigOptions,
  resolveConfig,
  resolveToken,
  SYSTEM_CONFIG_PATH,
  TOKEN_ENV_VAR,
} from "./loader";
export { type ValidateOptions, validateConfig } from "./validator";
