// test/helpers/fixtures.ts
// Builders for settings and diagnostics documents used across the suites

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export type Doc = Record<string, unknown>;

export function scalarVariable(overrides: Doc = {}): Doc {
  return {
    longname: "Half-saturation constant",
    subcategory: "1. general",
    units: "mmol/m^3",
    datatype: "real",
    default_value: 1.0,
    ...overrides,
  };
}

export function without(doc: Doc, ...keys: string[]): Doc {
  const copy = { ...doc };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

export function diagnostic(overrides: Doc = {}): Doc {
  return {
    module: "ecosys",
    longname: "Total chlorophyll",
    units: "mg/m^3",
    vertical_grid: "layer_avg",
    frequency: "high",
    operator: "average",
    ...overrides,
  };
}

export function settingsDoc(categories: Record<string, Doc>, order: string[] = Object.keys(categories)): Doc {
  return { _order: order, ...categories };
}

export function makeTempDir(prefix = "param-lint-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value, null, 2));
  return file;
}
