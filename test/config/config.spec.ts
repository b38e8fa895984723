import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/config/config";

describe("configFromEnv", () => {
  it("reads prefixed variables", () => {
    const config = configFromEnv("NETC", {
      NETC_DEFAULT_BAUDRATE: "500000",
      NETC_DEFAULT_BUS_NAME: "body",
      NETC_DEFAULT_INTERVAL_MS: "250",
      NETC_MIN_ENUM_BITS: "0",
      NETC_LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      defaultBaudrate: 500_000,
      defaultBusName: "body",
      defaultIntervalMs: 250,
      minEnumBits: 0,
      logLevel: "debug",
    });
  });

  it("skips unset and unparsable values", () => {
    expect(configFromEnv("NETC", { NETC_DEFAULT_BAUDRATE: "fast", NETC_LOG_LEVEL: "loud" })).toEqual({});
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys", () => {
    expect(configFromObject({ defaultBaudrate: 250_000, min_enum_bits: 0, log_level: "info" })).toEqual({
      defaultBaudrate: 250_000,
      minEnumBits: 0,
      logLevel: "info",
    });
  });

  it("ignores values of the wrong type", () => {
    expect(configFromObject({ defaultBaudrate: "250000", defaultBusName: 3 })).toEqual({});
  });
});

describe("mergeConfigs", () => {
  it("lets later layers win over defaults", () => {
    expect(mergeConfigs({ defaultBusName: "a" }, { defaultBusName: "b", minEnumBits: 0 })).toEqual({
      ...DEFAULT_CONFIG,
      defaultBusName: "b",
      minEnumBits: 0,
    });
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "netc-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a JSON file", () => {
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ default_interval_ms: 1000 }));
    expect(configFromFile(file)).toEqual({ defaultIntervalMs: 1000 });
  });

  it("rejects missing files and other formats", () => {
    const missing = path.join(dir, "missing.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);

    const yaml = path.join(dir, "config.yaml");
    fs.writeFileSync(yaml, "logLevel: debug");
    expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");
  });

  it("rejects JSON that is not an object", () => {
    const file = path.join(dir, "list.json");
    fs.writeFileSync(file, "[1, 2]");
    expect(() => configFromFile(file)).toThrow(`Config file must contain a JSON object: ${file}`);
  });

  it("discovers netc.config.json and layers overrides on top", () => {
    fs.writeFileSync(
      path.join(dir, "netc.config.json"),
      JSON.stringify({ defaultBusName: "file", defaultIntervalMs: 1000 })
    );
    const config = loadConfig({
      cwd: dir,
      env: { NETC_DEFAULT_BUS_NAME: "env", NETC_MIN_ENUM_BITS: "0" },
      overrides: { defaultIntervalMs: 10 },
    });
    expect(config).toEqual({
      defaultBaudrate: 1_000_000,
      defaultBusName: "file",
      defaultIntervalMs: 10,
      minEnumBits: 0,
      logLevel: "warn",
    });
  });

  it("falls back to defaults when nothing is configured", () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports each invalid field", () => {
    const result = validateConfig({
      defaultBaudrate: 0,
      defaultBusName: "",
      defaultIntervalMs: -1,
      minEnumBits: 2,
      logLevel: "warn",
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "defaultBaudrate must be a positive integer",
      "defaultIntervalMs must be positive",
      "minEnumBits must be 0 or 1",
      "defaultBusName must not be empty",
    ]);
  });

  it("warns about baudrates above classic CAN", () => {
    const result = validateConfig({ ...DEFAULT_CONFIG, defaultBaudrate: 2_000_000 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["defaultBaudrate is above 1 Mbit/s, which classic CAN does not support"]);
  });
});
