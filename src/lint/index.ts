export * from "./types";
export * from "./runner";
export * from "./analysis/variableFields";
export * from "./passes/settingsConsistency";
export * from "./passes/diagnosticsConsistency";
