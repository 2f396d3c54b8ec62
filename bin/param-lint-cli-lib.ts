// bin/param-lint-cli-lib.ts
// Shared CLI utilities for the param-lint command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { loadConfig, validateConfig, type ToolConfig } from "../src/core/config";
import { ConfigError, UsageError } from "../src/errors";
import { createDefaultRunner, type LintRunner } from "../src/lint/runner";
import type { DocumentKind } from "../src/lint/types";
import { loadDocument } from "../src/loader/document";
import { emitDiagnostics } from "../src/logging/emit";
import { withThreshold, type Logger, type LogThreshold } from "../src/logging/logger";
import { wrapFailure } from "../src/outcome/failure";
import { match } from "../src/outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  settings: string[];
  diagnostics: string[];
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export type DocumentTarget = {
  kind: DocumentKind;
  file: string;
};

export const EXIT_OK = 0;
export const EXIT_INCONSISTENT = 1;
export const EXIT_ERROR = 2;

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { settings: [], diagnostics: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--settings" || arg === "-s") {
      result.settings.push(requireValue(args, ++i, arg));
    } else if (arg === "--diagnostics" || arg === "-d") {
      result.diagnostics.push(requireValue(args, ++i, arg));
    } else if (arg === "--config" || arg === "-c") {
      result.config = requireValue(args, ++i, arg);
    } else {
      throw new UsageError(`Unknown argument: ${arg}`, arg);
    }
  }

  return result;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`${flag} expects a file path`, flag);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
param-lint - Consistency checks for parameter settings and diagnostics files

USAGE:
  param-lint [options] --settings <file> [--diagnostics <file>]

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -s, --settings <file>              Check a settings file (repeatable)
  -d, --diagnostics <file>           Check a diagnostics file (repeatable)
  -c, --config <file>                Read tool configuration from a JSON file
  --verbose                          Print informational lines
  -q, --quiet                        Print nothing; rely on the exit code

EXIT CODES:
  0                                  Every file is consistent
  1                                  At least one file is not consistent
  2                                  Bad arguments, configuration, or unreadable file

ENVIRONMENT:
  PARAMLINT_LOG_LEVEL                info, error, or silent
  PARAMLINT_DISABLE                  Comma-separated pass ids to skip
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `param-lint v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "param-lint v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function logLevelOverride(args: CliArgs): LogThreshold | undefined {
  if (args.quiet) return "silent";
  if (args.verbose) return "info";
  return undefined;
}

export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env, cwd?: string): ToolConfig {
  const logLevel = logLevelOverride(args);
  return loadConfig({
    configFile: args.config,
    overrides: logLevel ? { logLevel } : undefined,
    env,
    cwd,
  });
}

export function documentTargets(args: CliArgs): DocumentTarget[] {
  return [
    ...args.settings.map((file): DocumentTarget => ({ kind: "settings", file })),
    ...args.diagnostics.map((file): DocumentTarget => ({ kind: "diagnostics", file })),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Check every requested document and return the process exit code.
 * Nothing here calls process.exit.
 */
export function runCli(
  argv: string[],
  sink: Logger,
  options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): number {
  const prepared = prepare(argv, sink, options);
  if (typeof prepared === "number") {
    return prepared;
  }
  const { args, config } = prepared;

  const logger = withThreshold(sink, config.logLevel);
  const runner = createDefaultRunner(config.lint);

  const validation = validateConfig(config, runner.registeredIds());
  for (const warning of validation.warnings) {
    logger.warn(`Warning: ${warning}`);
  }
  if (!validation.valid) {
    for (const error of validation.errors) {
      logger.error(`Error: ${error}`);
    }
    return EXIT_ERROR;
  }

  const targets = documentTargets(args);
  if (targets.length === 0) {
    logger.error("Error: No settings or diagnostics file specified (see --help)");
    return EXIT_ERROR;
  }

  let exitCode = EXIT_OK;
  for (const target of targets) {
    const code = checkTarget(target, runner, logger);
    exitCode = Math.max(exitCode, code);
  }
  return exitCode;
}

function prepare(
  argv: string[],
  sink: Logger,
  options: { env?: NodeJS.ProcessEnv; cwd?: string }
): { args: CliArgs; config: ToolConfig } | number {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      sink.info(getHelpText());
      return EXIT_OK;
    }
    if (args.version) {
      sink.info(getVersion());
      return EXIT_OK;
    }
    return { args, config: buildConfig(args, options.env ?? process.env, options.cwd) };
  } catch (e) {
    if (e instanceof UsageError || e instanceof ConfigError) {
      sink.error(`Error: ${e.message}`);
      return EXIT_ERROR;
    }
    throw e;
  }
}

function checkTarget(target: DocumentTarget, runner: LintRunner, logger: Logger): number {
  logger.info(`Checking ${target.kind} file ${target.file}`);

  return match(loadDocument(target.file), {
    fail: ({ failure }) => {
      const wrapped = wrapFailure(failure, `Could not load ${target.kind} file: ${failure.message}`, { kind: target.kind });
      logger.error(`Error: ${wrapped.message}`);
      return EXIT_ERROR;
    },
    done: ({ value }) => {
      const report = runner.run(target.kind, value);
      emitDiagnostics(report.diagnostics, logger);
      if (report.valid) {
        logger.info(`${target.file}: consistent`);
        return EXIT_OK;
      }
      logger.error(`${target.file}: NOT consistent`);
      return EXIT_INCONSISTENT;
    },
  });
}
