import type { Diagnostic } from "../outcome/diagnostic";
import { decodeValue } from "../schema/value";
import { diagnosticsConsistencyPass } from "./passes/diagnosticsConsistency";
import { settingsConsistencyPass } from "./passes/settingsConsistency";
import type { DocumentKind, LintConfig, Pass, PassConfig, PassResult, SeverityOverride } from "./types";

const DEFAULT_CONFIG: LintConfig = { passes: {} };

export interface LintReport {
  valid: boolean;
  diagnostics: Diagnostic[];
  passResults: Map<string, PassResult>;
}

export class LintRunner {
  private passes: Map<string, Pass> = new Map();
  private config: LintConfig;

  constructor(config: Partial<LintConfig> = DEFAULT_CONFIG) {
    this.config = { passes: config?.passes ?? {} };
  }

  register(pass: Pass): void {
    if (this.passes.has(pass.id)) {
      throw new Error(`Pass already registered: ${pass.id}`);
    }
    this.passes.set(pass.id, pass);
  }

  registeredIds(): string[] {
    return Array.from(this.passes.keys()).sort();
  }

  /**
   * Decode `input` once and run every enabled pass for `kind` in id order.
   * Severity overrides rewrite diagnostics but never the verdict.
   */
  run(kind: DocumentKind, input: unknown): LintReport {
    const doc = decodeValue(input);
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();
    let valid = true;

    for (const pass of this.passesFor(kind)) {
      const config = this.getPassConfig(pass.id);
      const result = pass.run(doc);
      passResults.set(pass.id, result);
      diagnostics.push(...applySeverityOverride(result.diagnostics, config.severityOverride));
      valid = valid && result.valid;
    }

    return { valid, diagnostics, passResults };
  }

  private passesFor(kind: DocumentKind): Pass[] {
    return Array.from(this.passes.values())
      .filter(p => p.kind === kind && this.isPassEnabled(p.id))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  private getPassConfig(passId: string): PassConfig {
    return this.config.passes[passId] ?? { enabled: true };
  }

  private isPassEnabled(passId: string): boolean {
    const config = this.getPassConfig(passId);
    return config.enabled !== false && config.severityOverride !== "off";
  }
}

function applySeverityOverride(diagnostics: Diagnostic[], override?: SeverityOverride): Diagnostic[] {
  if (!override || override === "off") {
    return diagnostics;
  }
  return diagnostics.map(d => ({ ...d, severity: override }));
}

export const BUILTIN_PASSES: readonly Pass[] = [settingsConsistencyPass, diagnosticsConsistencyPass];

export function createDefaultRunner(config?: Partial<LintConfig>): LintRunner {
  const runner = new LintRunner(config ?? DEFAULT_CONFIG);
  for (const pass of BUILTIN_PASSES) {
    runner.register(pass);
  }
  return runner;
}
