// Error Classes
export class ParamLintError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "ParamLintError";
  }
}

export class ConfigError extends ParamLintError {
  constructor(
    message: string,
    public readonly field: string | null = null,
    public readonly configPath: string | null = null
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

export class UsageError extends ParamLintError {
  constructor(message: string, public readonly argument: string | null = null) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}
