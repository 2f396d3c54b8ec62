import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/core/config";
import { ConfigError } from "../../src/errors";
import { makeTempDir, writeJson } from "../helpers/fixtures";

const KNOWN = ["diagnostics/consistency", "settings/consistency"];

describe("configuration", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("param-lint-config-");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("configFromEnv", () => {
    it("reads the log level and disabled passes", () => {
      const config = configFromEnv({
        PARAMLINT_LOG_LEVEL: "error",
        PARAMLINT_DISABLE: "settings/consistency, diagnostics/consistency,",
      });

      expect(config).toEqual({
        logLevel: "error",
        lint: {
          passes: {
            "settings/consistency": { enabled: false },
            "diagnostics/consistency": { enabled: false },
          },
        },
      });
    });

    it("contributes nothing when unset", () => {
      expect(configFromEnv({})).toEqual({});
    });

    it("rejects an unknown log level", () => {
      expect(() => configFromEnv({ PARAMLINT_LOG_LEVEL: "debug" })).toThrow(ConfigError);
      try {
        configFromEnv({ PARAMLINT_LOG_LEVEL: "debug" });
      } catch (e) {
        expect(e).toBeInstanceOf(ConfigError);
        expect(e).toMatchObject({ field: "PARAMLINT_LOG_LEVEL", code: "CONFIG_ERROR" });
      }
    });

    it("honours a custom prefix", () => {
      expect(configFromEnv({ CHECK_LOG_LEVEL: "silent" }, "CHECK")).toEqual({ logLevel: "silent" });
    });
  });

  describe("configFromObject", () => {
    it("accepts boolean and object pass settings", () => {
      const config = configFromObject({
        log_level: "info",
        passes: {
          "settings/consistency": false,
          "diagnostics/consistency": { severityOverride: "warning" },
        },
      });

      expect(config).toEqual({
        logLevel: "info",
        lint: {
          passes: {
            "settings/consistency": { enabled: false },
            "diagnostics/consistency": { enabled: true, severityOverride: "warning" },
          },
        },
      });
    });

    it("rejects a bad severity override with the field path", () => {
      expect(() => configFromObject({ passes: { "settings/consistency": { severityOverride: "fatal" } } })).toThrow(
        "passes.settings/consistency.severityOverride must be one of error, warning, info, off"
      );
    });

    it("rejects non-object configs", () => {
      expect(() => configFromObject([])).toThrow("Config must be an object");
      expect(() => configFromObject({ passes: 3 })).toThrow("passes must be an object keyed by pass id");
      expect(() => configFromObject({ passes: { a: { enabled: "yes" } } })).toThrow("passes.a.enabled must be a boolean");
    });
  });

  describe("configFromFile", () => {
    it("loads a JSON file", () => {
      const file = writeJson(dir, "lint.json", { logLevel: "silent" });
      expect(configFromFile(file)).toEqual({ logLevel: "silent" });
    });

    it("reports missing, unsupported, and malformed files", () => {
      expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");

      const yaml = path.join(dir, "lint.yaml");
      fs.writeFileSync(yaml, "logLevel: info\n");
      expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");

      const broken = path.join(dir, "broken.json");
      fs.writeFileSync(broken, "{ logLevel");
      expect(() => configFromFile(broken)).toThrow(/^Invalid JSON in config file/);
    });
  });

  describe("mergeConfigs", () => {
    it("starts from the defaults", () => {
      expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
    });

    it("lets later sources win, merging passes by id", () => {
      const merged = mergeConfigs(
        { logLevel: "error", lint: { passes: { a: { enabled: false }, b: { enabled: false } } } },
        { lint: { passes: { b: { enabled: true } } } }
      );

      expect(merged).toEqual({
        logLevel: "error",
        lint: { passes: { a: { enabled: false }, b: { enabled: true } } },
      });
    });

    it("does not mutate the defaults", () => {
      mergeConfigs({ lint: { passes: { a: { enabled: false } } } });
      expect(DEFAULT_CONFIG.lint.passes).toEqual({});
    });
  });

  describe("loadConfig", () => {
    it("orders overrides over file over environment", () => {
      writeJson(dir, "param-lint.config.json", { logLevel: "silent" });
      const env = { PARAMLINT_LOG_LEVEL: "error", PARAMLINT_DISABLE: "settings/consistency" };

      expect(loadConfig({ env, cwd: dir })).toEqual({
        logLevel: "silent",
        lint: { passes: { "settings/consistency": { enabled: false } } },
      });
      expect(loadConfig({ env, cwd: dir, overrides: { logLevel: "info" } }).logLevel).toBe("info");
    });

    it("falls back to the environment and defaults without a file", () => {
      expect(loadConfig({ env: {}, cwd: dir })).toEqual(DEFAULT_CONFIG);
      expect(loadConfig({ env: { PARAMLINT_LOG_LEVEL: "error" }, cwd: dir }).logLevel).toBe("error");
    });

    it("prefers an explicit config file", () => {
      writeJson(dir, "param-lint.config.json", { logLevel: "silent" });
      const explicit = writeJson(dir, "other.json", { logLevel: "error" });

      expect(loadConfig({ configFile: explicit, env: {}, cwd: dir }).logLevel).toBe("error");
    });
  });

  describe("validateConfig", () => {
    it("accepts the defaults", () => {
      expect(validateConfig(DEFAULT_CONFIG, KNOWN)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("reports unknown pass ids", () => {
      const result = validateConfig(mergeConfigs({ lint: { passes: { bogus: { enabled: false } } } }), KNOWN);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(["Unknown pass: bogus. Known passes: diagnostics/consistency, settings/consistency"]);
    });

    it("warns when every pass is disabled", () => {
      const config = mergeConfigs({
        lint: {
          passes: {
            "settings/consistency": { enabled: false },
            "diagnostics/consistency": { enabled: true, severityOverride: "off" },
          },
        },
      });
      const result = validateConfig(config, KNOWN);

      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
    });
  });
});
