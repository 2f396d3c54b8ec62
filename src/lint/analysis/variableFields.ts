import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { isMap, keysOf, type ConfigValue } from "../../schema/value";
import type { PassResult } from "../types";

/** Checked in this order; only the first missing one is reported. */
export const REQUIRED_VARIABLE_FIELDS = ["longname", "subcategory", "units", "datatype", "default_value"] as const;

export type VariableField = (typeof REQUIRED_VARIABLE_FIELDS)[number];

/**
 * Check that a variable description carries the descriptive fields and, when
 * default_value is a mapping, a "default" entry in it.
 *
 * `name` is only used in messages; derived-type members arrive as "var%sub".
 */
export function checkVariableFields(spec: ConfigValue, name: string, path: string[] = [name]): PassResult {
  const entries = isMap(spec) ? spec.entries : new Map<string, ConfigValue>();

  for (const field of REQUIRED_VARIABLE_FIELDS) {
    if (!entries.has(field)) {
      return invalid([makeDiagnostic("E0103", { name, field }, path)]);
    }
  }

  const defaultValue = entries.get("default_value");
  if (isMap(defaultValue) && !defaultValue.entries.has("default")) {
    const defaultPath = [...path, "default_value"];
    return invalid([
      makeDiagnostic("E0600", { name }, defaultPath),
      makeDiagnostic("I0600", { keys: formatKeyList(keysOf(defaultValue)) }, defaultPath),
    ]);
  }

  return { valid: true, diagnostics: [] };
}

function invalid(diagnostics: Diagnostic[]): PassResult {
  return { valid: false, diagnostics };
}

function formatKeyList(keys: string[]): string {
  return `[${keys.map(k => `'${k}'`).join(", ")}]`;
}
