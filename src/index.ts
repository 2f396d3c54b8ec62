// src/index.ts
// Public API

export {
  SettingsValidator,
  DiagnosticsValidator,
  VariableFieldChecker,
  settingsDictionaryIsConsistent,
  diagnosticsDictionaryIsConsistent,
} from "./validators";

export * from "./lint";
export * from "./schema/value";
export * from "./logging/logger";
export { emitDiagnostics } from "./logging/emit";
export * from "./outcome/diagnostic";
export * from "./outcome/codes";
export * from "./outcome/outcome";
export * from "./outcome/failure";
export * from "./outcome/constructors";
export * from "./outcome/matchers";
export { loadDocument } from "./loader/document";
export * from "./core/config";
export * from "./errors";
