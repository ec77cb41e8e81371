/**
 * Integration tests: run directories on disk to CSV output
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { writeStatsCsv } from "../../src/csv-writer.js";
import { KeyMismatchError, NoInputError } from "../../src/errors.js";
import { mergeLogs, planMerge } from "../../src/merge.js";

describe("mergeLogs", () => {
  let tempDir: string;

  const writeRunFile = (relativePath: string, content: string): string => {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
    return filePath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "logmerge-integration-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should merge evaluation logs found in run directories", () => {
    writeRunFile("runs/seed-1/evaluation.yaml", "0: [1]\n100: [2]\n");
    writeRunFile("runs/seed-2/evaluation.yaml", "2: [3]\n98: [4]\n");
    writeRunFile("runs/seed-2/train.yaml", "0: [1000]\n");
    const outPath = path.join(tempDir, "out", "evaluation.csv");

    const result = mergeLogs({
      format: 1,
      loader: "yaml",
      inputs: [path.join(tempDir, "runs")],
      pattern: "evaluation*.yaml",
    });
    writeStatsCsv(outPath, result);

    expect(result.plan.files).toHaveLength(2);
    expect(fs.readFileSync(outPath, "utf8")).toBe("0,2,1\r\n100,3,1\r\n");
  });

  it("should write step-keyed YAML logs in numeric order", () => {
    const a = writeRunFile("a.yaml", "2: [1]\n10: [3]\n");
    const b = writeRunFile("b.yaml", "2: [3]\n10: [5]\n");
    const outPath = path.join(tempDir, "steps.csv");

    writeStatsCsv(outPath, mergeLogs({ format: 0, loader: "yaml", inputs: [a, b] }));

    expect(fs.readFileSync(outPath, "utf8")).toBe("2,2,1\r\n10,4,1\r\n");
  });

  it("should merge JSON line logs by step with named features", () => {
    const a = writeRunFile(
      "a.jsonl",
      ['{"eval": {"reward": 10, "len": [4]}}', '{"eval": {"reward": 20, "len": [6]}}'].join("\n")
    );
    const b = writeRunFile(
      "b.jsonl",
      ['{"eval": {"reward": 30, "len": [4]}}', '{"eval": {"reward": 40, "len": [8]}}'].join("\n")
    );

    const result = mergeLogs({
      format: 3,
      loader: "json_rows",
      features: ["eval,reward", "eval,len,0"],
      inputs: [a, b],
    });

    expect(result.header).toEqual(["reward", "0"]);
    expect(result.stats.get(0)).toEqual([20, 10, 4, 0]);
    expect(result.stats.get(1)).toEqual([30, 10, 7, 1]);
  });

  it("should use the loader's default pattern for directories", () => {
    writeRunFile("runs/a.yaml", "x: [1]\n");
    writeRunFile("runs/b.yml", "x: [3]\n");
    writeRunFile("runs/c.json", "{}\n");

    const plan = planMerge({
      format: 0,
      loader: "yaml",
      inputs: [path.join(tempDir, "runs")],
    });

    expect(plan.files.map((file) => path.basename(file))).toEqual(["a.yaml", "b.yml"]);
  });

  it("should fail before writing when keys differ", () => {
    const a = writeRunFile("a.yaml", "x: [1]\n");
    const b = writeRunFile("b.yaml", "y: [1]\n");

    expect(() => mergeLogs({ format: 0, loader: "yaml", inputs: [a, b] })).toThrow(
      KeyMismatchError
    );
  });

  it("should fail when a directory has no logs", () => {
    fs.mkdirSync(path.join(tempDir, "empty"));

    expect(() =>
      mergeLogs({ format: 0, loader: "yaml", inputs: [path.join(tempDir, "empty")] })
    ).toThrow(NoInputError);
  });
});
