import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { formatValue, isList, isMap, type ConfigValue } from "../../schema/value";
import type { Pass, PassResult } from "../types";

export const REQUIRED_DIAGNOSTIC_FIELDS = ["module", "longname", "units", "vertical_grid", "frequency", "operator"] as const;

export const FREQUENCIES = ["never", "low", "medium", "high"] as const;
export const OPERATORS = ["instantaneous", "average", "minimum", "maximum"] as const;

export type Frequency = (typeof FREQUENCIES)[number];
export type Operator = (typeof OPERATORS)[number];

export const diagnosticsConsistencyPass: Pass = {
  id: "diagnostics/consistency",
  name: "Diagnostics Consistency Check",
  kind: "diagnostics",
  run: checkDiagnostics,
};

export function isFrequency(v: ConfigValue): boolean {
  return isAllowed(v, FREQUENCIES);
}

export function isOperator(v: ConfigValue): boolean {
  return isAllowed(v, OPERATORS);
}

/**
 * Every top-level key names a diagnostic whose description has the required
 * fields, a frequency/operator pairing of matching shape and length, and only
 * allowed frequency and operator values.
 */
export function checkDiagnostics(doc: ConfigValue): PassResult {
  if (!isMap(doc)) {
    return { valid: false, diagnostics: [makeDiagnostic("E0300")] };
  }

  const diagnostics: Diagnostic[] = [];
  let valid = true;

  for (const [diag, entry] of doc.entries) {
    if (!isMap(entry)) {
      diagnostics.push(makeDiagnostic("E0301", { diag }, [diag]));
      valid = false;
      continue;
    }

    const missing = REQUIRED_DIAGNOSTIC_FIELDS.filter(field => !entry.entries.has(field));
    for (const field of missing) {
      diagnostics.push(makeDiagnostic("E0104", { field, diag }, [diag]));
    }
    if (missing.length > 0) {
      valid = false;
      continue;
    }

    const frequency = entry.entries.get("frequency");
    const operator = entry.entries.get("operator");
    if (frequency === undefined || operator === undefined) continue;

    // Logged only: a shape mismatch alone leaves the entry valid.
    if (isList(frequency) !== isList(operator)) {
      diagnostics.push(makeDiagnostic("E0302", { diag }, [diag]));
    }

    if (isList(frequency) && isList(operator) && frequency.items.length !== operator.items.length) {
      diagnostics.push(
        makeDiagnostic("E0400", { diag, freqLen: frequency.items.length, opLen: operator.items.length }, [diag])
      );
      valid = false;
      continue;
    }

    for (const [freq, op] of pairValues(frequency, operator)) {
      if (!isFrequency(freq)) {
        diagnostics.push(makeDiagnostic("E0500", { diag, value: formatValue(freq) }, [diag, "frequency"]));
        valid = false;
      }
      if (!isOperator(op)) {
        diagnostics.push(makeDiagnostic("E0501", { diag, value: formatValue(op) }, [diag, "operator"]));
        valid = false;
      }
    }
  }

  return { valid, diagnostics };
}

function isAllowed(v: ConfigValue, allowed: readonly string[]): boolean {
  return v.tag === "Scalar" && typeof v.value === "string" && allowed.includes(v.value);
}

/**
 * Two lists pair up index by index. Any other combination is one pair of the
 * values as written, so a list facing a single value is checked whole and
 * never matches an allowed value.
 */
function pairValues(frequency: ConfigValue, operator: ConfigValue): [ConfigValue, ConfigValue][] {
  if (isList(frequency) && isList(operator)) {
    const operators = operator.items;
    return frequency.items.map((freq, n): [ConfigValue, ConfigValue] => [freq, operators[n]]);
  }
  return [[frequency, operator]];
}
