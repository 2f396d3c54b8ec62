// src/core/config/config.ts
// Configuration for the param-lint tool

import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "../../errors";
import type { LintConfig, PassConfig, SeverityOverride } from "../../lint/types";
import { isLogThreshold, type LogThreshold } from "../../logging/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type ToolConfig = {
  /** Lowest severity printed: info, error, or silent */
  logLevel: LogThreshold;
  /** Per-pass enable flags and severity overrides, keyed by pass id */
  lint: LintConfig;
};

export type ConfigSource = Partial<ToolConfig>;

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOG_LEVEL: LogThreshold = "info";

export const DEFAULT_CONFIG: ToolConfig = {
  logLevel: DEFAULT_LOG_LEVEL,
  lint: { passes: {} },
};

export const DEFAULT_CONFIG_PATHS = ["param-lint.config.json"];

const SEVERITY_OVERRIDES: readonly SeverityOverride[] = ["error", "warning", "info", "off"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 * Only variables that are set contribute.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "PARAMLINT"): ConfigSource {
  const config: ConfigSource = {};

  const logLevel = env[`${prefix}_LOG_LEVEL`];
  if (logLevel) {
    if (!isLogThreshold(logLevel)) {
      throw new ConfigError(`Invalid ${prefix}_LOG_LEVEL: ${logLevel}`, `${prefix}_LOG_LEVEL`);
    }
    config.logLevel = logLevel;
  }

  const disabled = (env[`${prefix}_DISABLE`] || "")
    .split(",")
    .map(id => id.trim())
    .filter(id => id.length > 0);
  if (disabled.length > 0) {
    const passes: Record<string, PassConfig> = {};
    for (const id of disabled) {
      passes[id] = { enabled: false };
    }
    config.lint = { passes };
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ConfigSource {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, null, filePath);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext}`, null, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Invalid JSON in config file ${filePath}: ${reason}`, null, filePath);
  }

  return configFromObject(data, filePath);
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts `logLevel`/`log_level` and `passes`.
 */
export function configFromObject(data: unknown, configPath: string | null = null): ConfigSource {
  if (!isRecord(data)) {
    throw new ConfigError("Config must be an object", null, configPath);
  }

  const config: ConfigSource = {};

  const logLevel = data.logLevel ?? data.log_level;
  if (logLevel !== undefined) {
    if (!isLogThreshold(logLevel)) {
      throw new ConfigError(`Invalid logLevel: ${String(logLevel)}`, "logLevel", configPath);
    }
    config.logLevel = logLevel;
  }

  if (data.passes !== undefined) {
    if (!isRecord(data.passes)) {
      throw new ConfigError("passes must be an object keyed by pass id", "passes", configPath);
    }
    const passes: Record<string, PassConfig> = {};
    for (const [id, raw] of Object.entries(data.passes)) {
      passes[id] = passConfigFromObject(raw, `passes.${id}`, configPath);
    }
    config.lint = { passes };
  }

  return config;
}

function passConfigFromObject(raw: unknown, field: string, configPath: string | null): PassConfig {
  if (typeof raw === "boolean") {
    return { enabled: raw };
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`${field} must be a boolean or an object`, field, configPath);
  }

  const enabled = raw.enabled ?? true;
  if (typeof enabled !== "boolean") {
    throw new ConfigError(`${field}.enabled must be a boolean`, `${field}.enabled`, configPath);
  }

  const override = raw.severityOverride ?? raw.severity_override;
  if (override === undefined) {
    return { enabled };
  }
  const severityOverride = SEVERITY_OVERRIDES.find(s => s === override);
  if (severityOverride === undefined) {
    throw new ConfigError(
      `${field}.severityOverride must be one of ${SEVERITY_OVERRIDES.join(", ")}`,
      `${field}.severityOverride`,
      configPath
    );
  }
  return { enabled, severityOverride };
}

/**
 * Merge configs with later ones overriding earlier ones.
 * Pass settings merge per pass id.
 */
export function mergeConfigs(...configs: ConfigSource[]): ToolConfig {
  const result: ToolConfig = {
    logLevel: DEFAULT_CONFIG.logLevel,
    lint: { passes: { ...DEFAULT_CONFIG.lint.passes } },
  };

  for (const cfg of configs) {
    if (cfg.logLevel) {
      result.logLevel = cfg.logLevel;
    }
    if (cfg.lint) {
      result.lint = { passes: { ...result.lint.passes, ...cfg.lint.passes } };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigSource;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): ToolConfig {
  const sources: ConfigSource[] = [configFromEnv(options?.env ?? process.env)];

  if (options?.configFile) {
    sources.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const p of DEFAULT_CONFIG_PATHS) {
      const candidate = path.join(cwd, p);
      if (fs.existsSync(candidate)) {
        sources.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    sources.push(options.overrides);
  }

  return mergeConfigs(...sources);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

/**
 * Check pass settings against the passes that actually exist.
 */
export function validateConfig(config: ToolConfig, knownPassIds: readonly string[]): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const id of Object.keys(config.lint.passes)) {
    if (!knownPassIds.includes(id)) {
      errors.push(`Unknown pass: ${id}. Known passes: ${knownPassIds.join(", ")}`);
    }
  }

  const active = knownPassIds.filter(id => {
    const pass = config.lint.passes[id];
    return pass === undefined || (pass.enabled !== false && pass.severityOverride !== "off");
  });
  if (knownPassIds.length > 0 && active.length === 0) {
    warnings.push("Every pass is disabled; documents will be reported consistent without being checked");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
