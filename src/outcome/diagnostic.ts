export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Key path of the offending location, outermost key first. */
  path?: string[];
  data?: Record<string, unknown>;
}
