// src/validators.ts
// Entry points for checking parameter-settings and diagnostics documents

import { checkVariableFields } from "./lint/analysis/variableFields";
import { checkDiagnostics } from "./lint/passes/diagnosticsConsistency";
import { checkSettings } from "./lint/passes/settingsConsistency";
import type { PassResult } from "./lint/types";
import { emitDiagnostics } from "./logging/emit";
import { consoleLogger, type Logger } from "./logging/logger";
import { decodeValue } from "./schema/value";

/**
 * Checks the structure of a settings document: _order bookkeeping, the
 * datatype of every variable and the descriptive fields of scalar-typed
 * variables and derived-type members.
 *
 * A document without `_order` is reported and still answers true.
 */
export class SettingsValidator {
  constructor(private readonly logger: Logger = consoleLogger) {}

  check(settings: unknown): PassResult {
    return checkSettings(decodeValue(settings));
  }

  isConsistent(settings: unknown): boolean {
    const result = this.check(settings);
    emitDiagnostics(result.diagnostics, this.logger);
    return result.valid;
  }
}

/**
 * Checks required fields, the frequency/operator pairing and the allowed
 * frequency and operator values of every diagnostic.
 */
export class DiagnosticsValidator {
  constructor(private readonly logger: Logger = consoleLogger) {}

  check(diags: unknown): PassResult {
    return checkDiagnostics(decodeValue(diags));
  }

  isConsistent(diags: unknown): boolean {
    const result = this.check(diags);
    emitDiagnostics(result.diagnostics, this.logger);
    return result.valid;
  }
}

export class VariableFieldChecker {
  constructor(private readonly logger: Logger = consoleLogger) {}

  check(variableSpec: unknown, name: string): PassResult {
    return checkVariableFields(decodeValue(variableSpec), name);
  }

  isValid(variableSpec: unknown, name: string): boolean {
    const result = this.check(variableSpec, name);
    emitDiagnostics(result.diagnostics, this.logger);
    return result.valid;
  }
}

export function settingsDictionaryIsConsistent(settings: unknown, logger: Logger = consoleLogger): boolean {
  return new SettingsValidator(logger).isConsistent(settings);
}

export function diagnosticsDictionaryIsConsistent(diags: unknown, logger: Logger = consoleLogger): boolean {
  return new DiagnosticsValidator(logger).isConsistent(diags);
}
