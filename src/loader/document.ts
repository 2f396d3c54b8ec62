// src/loader/document.ts
// Read a settings or diagnostics document from disk

import * as fs from "fs";
import * as path from "path";
import { done, err } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";

/**
 * Load and parse a JSON document. The parsed value is handed over untouched;
 * checking its shape is the validators' job.
 */
export function loadDocument(filePath: string): Outcome<unknown> {
  const meta = { source: filePath };

  if (!fs.existsSync(filePath)) {
    return err("file-not-found", `File not found: ${filePath}`, { context: { path: filePath } }, meta);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    return err(
      "unsupported-format",
      `Unsupported document format: ${ext || "(none)"}`,
      { context: { path: filePath, extension: ext } },
      meta
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    return err("read-failed", `Could not read ${filePath}: ${errorMessage(e)}`, { context: { path: filePath } }, meta);
  }

  try {
    return done<unknown>(JSON.parse(content), meta);
  } catch (e) {
    return err("parse-failed", `Invalid JSON in ${filePath}: ${errorMessage(e)}`, { context: { path: filePath } }, meta);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
