/**
 * Unit tests for population statistics
 */

import { describe, it, expect } from "vitest";
import { mean, populationStd, summarize } from "../../src/statistics.js";

describe("statistics", () => {
  it("should compute the mean", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
  });

  it("should divide by N for the standard deviation", () => {
    expect(populationStd([2, 4])).toBe(1);
    expect(populationStd([1, 2, 3, 4])).toBeCloseTo(1.118034, 6);
  });

  it("should give zero spread for repeated values", () => {
    expect(summarize([7, 7, 7])).toEqual([7, 0]);
  });

  it("should return NaN for an empty pool", () => {
    const [m, s] = summarize([]);
    expect(Number.isNaN(m)).toBe(true);
    expect(Number.isNaN(s)).toBe(true);
  });
});
