import type { Diagnostic } from "../outcome/diagnostic";
import type { ConfigValue } from "../schema/value";

export type DocumentKind = "settings" | "diagnostics";

export interface PassResult {
  /** The pass's own verdict; not derived from diagnostic severities. */
  valid: boolean;
  diagnostics: Diagnostic[];
}

export interface Pass {
  id: string;
  name: string;
  kind: DocumentKind;
  run(doc: ConfigValue): PassResult;
}

export type SeverityOverride = "error" | "warning" | "info" | "off";

export interface PassConfig {
  enabled: boolean;
  severityOverride?: SeverityOverride;
}

export interface LintConfig {
  passes: Record<string, PassConfig>;
}
