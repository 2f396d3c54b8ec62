import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

export type ViolationCategory =
  | "MissingRequiredKey"
  | "UnlistedCategory"
  | "UndeclaredCategory"
  | "TypeMismatch"
  | "LengthMismatch"
  | "InvalidEnumValue"
  | "MissingDefaultKey"
  | "Context";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: ViolationCategory;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0101: { code: "E0101", severity: "error", category: "MissingRequiredKey", template: "Can not find _order key" },
  E0102: { code: "E0102", severity: "error", category: "MissingRequiredKey", template: "Variable {name} does not contain a key for datatype" },
  E0103: {
    code: "E0103",
    severity: "error",
    category: "MissingRequiredKey",
    template: "Variable {name} is not well-defined in YAML\n     * Expecting {field} as a key",
  },
  E0104: { code: "E0104", severity: "error", category: "MissingRequiredKey", template: "{field} not a key in DiagsDict['{diag}']" },

  E0201: { code: "E0201", severity: "error", category: "UndeclaredCategory", template: "Can not find {category} category that is listed in _order" },
  E0202: { code: "E0202", severity: "error", category: "UnlistedCategory", template: "Category {category} not included in _order" },

  E0300: { code: "E0300", severity: "error", category: "TypeMismatch", template: "Argument must be a dictionary" },
  E0301: { code: "E0301", severity: "error", category: "TypeMismatch", template: "DiagsDict['{diag}'] must be a dictionary" },
  E0302: {
    code: "E0302",
    severity: "error",
    category: "TypeMismatch",
    template: "Inconsistency in DiagsDict['{diag}']: either both frequency and operator must be lists or neither can be",
  },
  E0303: { code: "E0303", severity: "error", category: "TypeMismatch", template: "_order must be a list" },
  E0304: { code: "E0304", severity: "error", category: "TypeMismatch", template: "Category {category} must be a dictionary" },

  E0400: {
    code: "E0400",
    severity: "error",
    category: "LengthMismatch",
    template: "Inconsistency in DiagsDict['{diag}']: frequency is length {freqLen} but operator is length {opLen}",
  },

  E0500: { code: "E0500", severity: "error", category: "InvalidEnumValue", template: "Inconsistency in DiagsDict['{diag}']: '{value}' is not a valid frequency" },
  E0501: { code: "E0501", severity: "error", category: "InvalidEnumValue", template: "Inconsistency in DiagsDict['{diag}']: '{value}' is not a valid operator" },

  E0600: { code: "E0600", severity: "error", category: "MissingDefaultKey", template: "default_value dictionary in variable {name} must have 'default' key" },
  I0600: { code: "I0600", severity: "info", category: "Context", template: "Keys in default_value are {keys}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function categoryOf(code: string): ViolationCategory | undefined {
  return isDiagnosticCode(code) ? DIAGNOSTIC_CODES[code].category : undefined;
}

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CODES, code);
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params: Record<string, string | number> = {},
  path?: string[]
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  // Single pass, so a parameter value that looks like a placeholder stays literal.
  const message = def.template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    key in params ? String(params[key]) : whole
  );

  return {
    code: def.code,
    severity: def.severity,
    message,
    path,
    data: Object.keys(params).length > 0 ? { ...params } : undefined,
  };
}
