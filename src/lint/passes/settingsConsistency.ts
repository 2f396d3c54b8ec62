import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { formatValue, isMap, type ConfigValue } from "../../schema/value";
import { checkVariableFields } from "../analysis/variableFields";
import type { Pass, PassResult } from "../types";

export const ORDER_KEY = "_order";

export const settingsConsistencyPass: Pass = {
  id: "settings/consistency",
  name: "Settings Consistency Check",
  kind: "settings",
  run: checkSettings,
};

/**
 * Settings documents must satisfy:
 *   1. _order is a top-level key
 *   2. everything listed in _order is a top-level key
 *   3. every top-level key not starting with "_" is listed in _order
 *   4. every variable carries a datatype
 *   5. scalar-typed variables carry the descriptive fields (see checkVariableFields)
 *   6. derived-type variables: every member of datatype not starting with "_"
 *      is a variable per (5); members are not descended into further
 */
export function checkSettings(doc: ConfigValue): PassResult {
  const diagnostics: Diagnostic[] = [];
  let valid = true;

  if (!isMap(doc)) {
    return { valid: false, diagnostics: [makeDiagnostic("E0300")] };
  }

  const order = doc.entries.get(ORDER_KEY);
  if (order === undefined) {
    // Reported, yet the document still counts as consistent.
    return { valid: true, diagnostics: [makeDiagnostic("E0101")] };
  }

  let orderItems: readonly ConfigValue[] = [];
  if (order.tag === "List") {
    orderItems = order.items;
  } else {
    diagnostics.push(makeDiagnostic("E0303", {}, [ORDER_KEY]));
    valid = false;
  }

  // Only string entries name a category; 1 never matches the key "1".
  const orderNames: string[] = [];
  for (const item of orderItems) {
    const name = item.tag === "Scalar" && typeof item.value === "string" ? item.value : undefined;
    if (name !== undefined && doc.entries.has(name)) {
      orderNames.push(name);
      continue;
    }
    diagnostics.push(makeDiagnostic("E0201", { category: formatValue(item) }, [ORDER_KEY]));
    valid = false;
  }

  for (const [category, variables] of doc.entries) {
    if (category.startsWith("_")) continue;

    if (!orderNames.includes(category)) {
      diagnostics.push(makeDiagnostic("E0202", { category }, [category]));
      valid = false;
    }

    if (!isMap(variables)) {
      diagnostics.push(makeDiagnostic("E0304", { category }, [category]));
      valid = false;
      continue;
    }

    for (const [varName, spec] of variables.entries) {
      const varPath = [category, varName];
      const datatype = isMap(spec) ? spec.entries.get("datatype") : undefined;

      if (datatype === undefined) {
        diagnostics.push(makeDiagnostic("E0102", { name: varName }, varPath));
        valid = false;
        continue;
      }

      if (isMap(datatype)) {
        for (const [member, memberSpec] of datatype.entries) {
          if (member.startsWith("_")) continue;
          const result = checkVariableFields(memberSpec, `${varName}%${member}`, [...varPath, "datatype", member]);
          diagnostics.push(...result.diagnostics);
          valid = valid && result.valid;
        }
      } else {
        const result = checkVariableFields(spec, varName, varPath);
        diagnostics.push(...result.diagnostics);
        valid = valid && result.valid;
      }
    }
  }

  return { valid, diagnostics };
}
