import { describe, it, expect } from "vitest";
import { LintRunner, createDefaultRunner } from "../../src/lint/runner";
import type { DocumentKind, Pass, PassResult } from "../../src/lint/types";
import type { Diagnostic } from "../../src/outcome/diagnostic";
import type { ConfigValue } from "../../src/schema/value";
import { diagnostic, scalarVariable, settingsDoc, without } from "../helpers/fixtures";

describe("LintRunner", () => {
  it("registers the built-in passes", () => {
    expect(createDefaultRunner().registeredIds()).toEqual(["diagnostics/consistency", "settings/consistency"]);
  });

  it("runs only the passes for the requested document kind", () => {
    const report = createDefaultRunner().run("settings", settingsDoc({ cat1: { v1: scalarVariable() } }));

    expect(report.valid).toBe(true);
    expect(report.diagnostics).toEqual([]);
    expect(Array.from(report.passResults.keys())).toEqual(["settings/consistency"]);
  });

  it("runs passes of one kind in id order and combines their verdicts", () => {
    const calls: string[] = [];
    const runner = new LintRunner();
    runner.register(makePass("settings/b", "settings", () => { calls.push("b"); return { valid: true, diagnostics: [] }; }));
    runner.register(makePass("settings/a", "settings", () => {
      calls.push("a");
      return { valid: false, diagnostics: [note("X", "oops", "error")] };
    }));
    runner.register(makePass("diagnostics/c", "diagnostics", () => { calls.push("c"); return { valid: true, diagnostics: [] }; }));

    const report = runner.run("settings", {});
    expect(calls).toEqual(["a", "b"]);
    expect(report.valid).toBe(false);
    expect(report.diagnostics.map(d => d.message)).toEqual(["oops"]);
  });

  it("decodes the input once for every pass", () => {
    const seen: ConfigValue[] = [];
    const runner = new LintRunner();
    runner.register(makePass("settings/a", "settings", doc => { seen.push(doc); return { valid: true, diagnostics: [] }; }));
    runner.register(makePass("settings/b", "settings", doc => { seen.push(doc); return { valid: true, diagnostics: [] }; }));

    runner.run("settings", { _order: [] });
    expect(seen).toHaveLength(2);
    expect(seen[0]).toBe(seen[1]);
    expect(seen[0].tag).toBe("Map");
  });

  it("rejects duplicate pass ids", () => {
    const runner = createDefaultRunner();
    expect(() => runner.register(makePass("settings/consistency", "settings", () => ({ valid: true, diagnostics: [] }))))
      .toThrow("Pass already registered: settings/consistency");
  });

  it("applies severity overrides without changing the verdict", () => {
    const runner = createDefaultRunner({
      passes: { "diagnostics/consistency": { enabled: true, severityOverride: "warning" } },
    });

    const report = runner.run("diagnostics", { d: diagnostic({ frequency: "daily" }) });
    expect(report.valid).toBe(false);
    expect(report.diagnostics).toEqual([
      expect.objectContaining({ code: "E0500", severity: "warning" }),
    ]);
  });

  it("can lower info lines to errors as well", () => {
    const runner = new LintRunner({ passes: { "settings/info": { enabled: true, severityOverride: "error" } } });
    runner.register(makePass("settings/info", "settings", () => ({ valid: true, diagnostics: [note("I", "note", "info")] })));

    expect(runner.run("settings", {}).diagnostics[0].severity).toBe("error");
  });

  it("skips disabled passes", () => {
    const runner = createDefaultRunner({ passes: { "settings/consistency": { enabled: false } } });
    const report = runner.run("settings", settingsDoc({ cat1: { v1: without(scalarVariable(), "units") } }));

    expect(report.valid).toBe(true);
    expect(report.diagnostics).toEqual([]);
    expect(report.passResults.size).toBe(0);
  });

  it("treats an off override as disabled", () => {
    const runner = createDefaultRunner({ passes: { "diagnostics/consistency": { enabled: true, severityOverride: "off" } } });
    const report = runner.run("diagnostics", "not a mapping");

    expect(report.valid).toBe(true);
    expect(report.passResults.size).toBe(0);
  });
});

function makePass(id: string, kind: DocumentKind, run: (doc: ConfigValue) => PassResult): Pass {
  return { id, name: id, kind, run };
}

function note(code: string, message: string, severity: Diagnostic["severity"]): Diagnostic {
  return { code, message, severity };
}
