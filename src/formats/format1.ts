/**
 * Format 1: flat mapping, nearest integer key
 *
 * Like format 0, but keys are integers (steps, timestamps) that may drift
 * between runs. Each canonical key of the first file pools the samples of
 * the closest key of every file.
 */

import { requireNumberList } from "../record.js";
import { summarize } from "../statistics.js";
import type { FileData, FormatMerger, MergeResult, Stats } from "../types.js";
import { checkFeatures, checkInputs } from "./features.js";
import {
  assertSameKeyCount,
  indexIntegerKeys,
  resolveNearestKeys,
  sortedKeys,
} from "./keys.js";

export const format1: FormatMerger = {
  id: 1,
  label: "flat-nearest",
  description:
    "like format 0, but keys are integers and don't need to match exactly; " +
    "the closest entry of each file is selected.",
  requiresFeatures: false,

  merge(files: readonly FileData[], features?: readonly string[]): MergeResult {
    checkFeatures(format1, features);
    checkInputs(files);

    const tables = files.map((file, fileIndex) => {
      const samples = new Map<number, number[]>();
      for (const [key, value] of indexIntegerKeys(file, fileIndex)) {
        samples.set(key, requireNumberList(value, { fileIndex, key }));
      }
      return samples;
    });
    const keyLists = tables.map(sortedKeys);
    assertSameKeyCount(keyLists);

    const canonicalKeys = keyLists[0];
    const matches = resolveNearestKeys(canonicalKeys, keyLists);

    const stats: Stats = new Map();
    canonicalKeys.forEach((key, row) => {
      const pooled: number[] = [];
      matches[row].forEach((localKey, fileIndex) => {
        for (const sample of tables[fileIndex].get(localKey) ?? []) {
          pooled.push(sample);
        }
      });
      stats.set(key, summarize(pooled));
    });

    return { stats };
  },
};
