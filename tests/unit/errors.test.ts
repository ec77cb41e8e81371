/**
 * Tests for merge error types and formatting
 */

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  FeatureNotAllowedError,
  KeyCountMismatchError,
  KeyMismatchError,
  LoaderError,
  MergeError,
  PathNotFoundError,
  UnsupportedFormatError,
  formatErrorMessage,
  isMergeError,
} from "../../src/errors.js";

describe("Error types", () => {
  it("should keep the subclass and base class identity", () => {
    const error = new KeyCountMismatchError(2, 10, 9);

    expect(error).toBeInstanceOf(KeyCountMismatchError);
    expect(error).toBeInstanceOf(MergeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("KeyCountMismatchError");
    expect(error.code).toBe("KEY_COUNT_MISMATCH");
    expect(isMergeError(error)).toBe(true);
    expect(isMergeError(new Error("plain"))).toBe(false);
  });

  it("should describe feature misuse in both directions", () => {
    expect(new FeatureNotAllowedError(0, "forbidden").message).toBe(
      "Format 0 can only merge top-level values; features can't be selected"
    );
    expect(new FeatureNotAllowedError(3, "required").message).toBe(
      "Format 3 requires at least one feature"
    );
  });
});

describe("formatErrorMessage", () => {
  it("should name the file behind a key mismatch", () => {
    const message = formatErrorMessage(new KeyMismatchError(1, ["b"], ["c"]), [
      "runs/a.yaml",
      "runs/b.yaml",
    ]);

    expect(message.split("\n")).toEqual([
      "✗ Input files have different keys",
      "",
      "  Keys differ between files 0 and 1 (missing: b; unexpected: c)",
      "",
      "  Context: runs/b.yaml (file #1)",
      "",
      "  If keys are steps or timestamps that drift between runs:",
      "    use --format 1 to match the nearest key",
    ]);
  });

  it("should fall back to the file index", () => {
    const message = formatErrorMessage(
      new PathNotFoundError(["metrics", "f1"], 1, { fileIndex: 3, key: 0 })
    );

    expect(message).toContain("✗ Feature 'metrics,f1' not found");
    expect(message).toContain("  Context: file #3");
  });

  it("should list supported formats", () => {
    const message = formatErrorMessage(new UnsupportedFormatError("7", [0, 1, 2, 3]));

    expect(message).toContain("✗ Format 7 not supported");
    expect(message).toContain("  Supported formats: 0, 1, 2, 3");
  });

  it("should include the cause of loader errors", () => {
    const message = formatErrorMessage(
      new LoaderError("Failed to parse YAML: bad indent", "x.yaml", new Error("bad indent"))
    );

    expect(message).toContain("✗ Failed to load x.yaml");
    expect(message).toContain("  Context: bad indent");
  });

  it("should list config problems", () => {
    const message = formatErrorMessage(
      new ConfigError("Invalid config in c.json", ["format must be an integer"])
    );

    expect(message).toContain("  Invalid config in c.json\n  • format must be an integer");
  });

  it("should format unknown errors", () => {
    expect(formatErrorMessage("boom")).toBe(
      "✗ An unexpected error occurred\n\n  boom\n"
    );
  });
});
