#!/usr/bin/env npx tsx
// bin/param-lint.ts
// Check parameter settings and diagnostics files from the command line
//
// Run:  npx tsx bin/param-lint.ts --settings settings.json --diagnostics diags.json

import { runCli } from "./param-lint-cli-lib";
import { consoleLogger } from "../src/logging/logger";

process.exitCode = runCli(process.argv.slice(2), consoleLogger);
