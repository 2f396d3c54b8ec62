// src/core/config/index.ts
// Configuration system exports

export {
  type ToolConfig,
  type ConfigSource,
  type ConfigValidation,
  DEFAULT_LOG_LEVEL,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATHS,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
