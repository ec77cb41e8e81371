/**
 * Unit tests for format 3 (per-step nested records)
 */

import { describe, it, expect } from "vitest";
import {
  FeatureNotAllowedError,
  NonNumericValueError,
  PathNotFoundError,
  StepCountMismatchError,
} from "../../../src/errors.js";
import { format3 } from "../../../src/formats/format3.js";
import { toDataValue } from "../../../src/record.js";

describe("format3", () => {
  const files = [
    toDataValue([
      { metrics: { loss: 1, acc: 0.5 } },
      { metrics: { loss: 3, acc: 0.25 } },
    ]),
    toDataValue([
      { metrics: { loss: 3, acc: 0.5 } },
      { metrics: { loss: 5, acc: 0.75 } },
    ]),
  ];

  it("should combine every feature per step", () => {
    const { stats, header } = format3.merge(files, ["metrics,loss", "metrics,acc"]);

    expect(header).toEqual(["loss", "acc"]);
    expect([...stats.keys()]).toEqual([0, 1]);
    expect(stats.get(0)).toEqual([2, 1, 0.5, 0]);
    expect(stats.get(1)).toEqual([4, 1, 0.5, 0.25]);
  });

  it("should produce two statistics per feature", () => {
    const { stats, header } = format3.merge(files, ["metrics,loss"]);

    expect(header).toHaveLength(1);
    for (const row of stats.values()) {
      expect(row).toHaveLength(2);
    }
  });

  it("should read a mapping of steps in key order", () => {
    const { stats } = format3.merge(
      [
        toDataValue({ 1: { loss: 4 }, 0: { loss: 2 } }),
        toDataValue([{ loss: 2 }, { loss: 6 }]),
      ],
      ["loss"]
    );

    expect(stats.get(0)).toEqual([2, 0]);
    expect(stats.get(1)).toEqual([5, 1]);
  });

  it("should require features", () => {
    expect(() => format3.merge(files)).toThrow(FeatureNotAllowedError);
    expect(() => format3.merge(files, [])).toThrow(
      "Format 3 requires at least one feature"
    );
  });

  it("should fail when step counts differ", () => {
    expect(() =>
      format3.merge([toDataValue([{ loss: 1 }]), toDataValue([])], ["loss"])
    ).toThrow(StepCountMismatchError);
  });

  it("should fail when a path is missing", () => {
    try {
      format3.merge(files, ["metrics,f1"]);
      expect.fail("expected a missing path");
    } catch (error) {
      expect(error).toBeInstanceOf(PathNotFoundError);
      if (error instanceof PathNotFoundError) {
        expect(error.location).toEqual({ fileIndex: 0, key: 0 });
      }
    }
  });

  it("should fail when the path ends on a record", () => {
    expect(() => format3.merge(files, ["metrics"])).toThrow(NonNumericValueError);
  });
});
