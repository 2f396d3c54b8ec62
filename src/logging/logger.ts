// src/logging/logger.ts
// Log sink handed to validators and the CLI

export type LogLevel = "error" | "warn" | "info";
export type LogThreshold = "error" | "info" | "silent";

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

export type LogRecord = {
  level: LogLevel;
  message: string;
};

export const consoleLogger: Logger = {
  error: message => console.error(message),
  warn: message => console.warn(message),
  info: message => console.log(message),
};

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
};

/**
 * Keeps every line in memory, in emission order.
 */
export class MemoryLogger implements Logger {
  readonly records: LogRecord[] = [];

  error(message: string): void {
    this.records.push({ level: "error", message });
  }

  warn(message: string): void {
    this.records.push({ level: "warn", message });
  }

  info(message: string): void {
    this.records.push({ level: "info", message });
  }

  lines(level?: LogLevel): string[] {
    return this.records
      .filter(r => level === undefined || r.level === level)
      .map(r => r.message);
  }

  clear(): void {
    this.records.length = 0;
  }
}

/**
 * Drop lines below the threshold. "error" still lets warnings through.
 */
export function withThreshold(logger: Logger, threshold: LogThreshold): Logger {
  switch (threshold) {
    case "info":
      return logger;
    case "error":
      return { error: m => logger.error(m), warn: m => logger.warn(m), info: () => {} };
    case "silent":
      return silentLogger;
  }
}

export function isLogThreshold(value: unknown): value is LogThreshold {
  return value === "error" || value === "info" || value === "silent";
}
