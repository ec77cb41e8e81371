/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILENAME, loadConfig, validateConfig } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

describe("validateConfig", () => {
  it("should accept every known field", () => {
    const result = validateConfig({
      format: 3,
      loader: "json_rows",
      features: ["metrics,loss"],
      pattern: "*.jsonl",
      overwrite: true,
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.config).toEqual({
      format: 3,
      loader: "json_rows",
      features: ["metrics,loss"],
      pattern: "*.jsonl",
      overwrite: true,
    });
  });

  it("should warn about unknown fields", () => {
    const result = validateConfig({ format: 0, out: "stats.csv" });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["unknown field 'out' is ignored"]);
  });

  it("should report wrongly typed fields", () => {
    const result = validateConfig({
      format: "1",
      features: "loss",
      overwrite: "yes",
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "format must be an integer",
      "features must be an array of strings",
      "overwrite must be a boolean",
    ]);
  });

  it("should require an object", () => {
    expect(validateConfig([1, 2]).errors).toEqual(["config must be a JSON object"]);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "logmerge-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should return an empty config when no file exists", () => {
    expect(loadConfig({ cwd: tempDir })).toEqual({ config: {}, warnings: [] });
  });

  it("should read the default file from the working directory", () => {
    const configPath = path.join(tempDir, CONFIG_FILENAME);
    fs.writeFileSync(configPath, JSON.stringify({ format: 1, loader: "yaml" }));

    expect(loadConfig({ cwd: tempDir })).toEqual({
      config: { format: 1, loader: "yaml" },
      path: configPath,
      warnings: [],
    });
  });

  it("should fail for a missing explicit file", () => {
    expect(() =>
      loadConfig({ configPath: path.join(tempDir, "custom.json") })
    ).toThrow(ConfigError);
  });

  it("should fail for malformed JSON", () => {
    const configPath = path.join(tempDir, CONFIG_FILENAME);
    fs.writeFileSync(configPath, "{ format: 1 }");

    expect(() => loadConfig({ cwd: tempDir })).toThrow(/^Failed to read /);
  });

  it("should fail for invalid fields", () => {
    const configPath = path.join(tempDir, CONFIG_FILENAME);
    fs.writeFileSync(configPath, JSON.stringify({ loader: 3 }));

    try {
      loadConfig({ cwd: tempDir });
      expect.fail("expected a config error");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.errors).toEqual(["loader must be a string"]);
      }
    }
  });
});
