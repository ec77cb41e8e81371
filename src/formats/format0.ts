/**
 * Format 0: flat mapping, exact keys
 *
 * Every file maps the same keys to lists of numbers. The lists of all files
 * are pooled per key. Integer keys are reported as numbers.
 */

import { KeyMismatchError } from "../errors.js";
import { requireNumberList } from "../record.js";
import { summarize } from "../statistics.js";
import type { FileData, FormatMerger, MergeResult, Stats } from "../types.js";
import { checkFeatures, checkInputs } from "./features.js";
import { assertSameKeySets, indexKeys, toStatKey } from "./keys.js";

export const format0: FormatMerger = {
  id: 0,
  label: "flat-exact",
  description:
    "each file is a mapping from key to a list of values; lists of all " +
    "files are collapsed into one statistic per key. All keys must match.",
  requiresFeatures: false,

  merge(files: readonly FileData[], features?: readonly string[]): MergeResult {
    checkFeatures(format0, features);
    checkInputs(files);

    const tables = files.map((file, fileIndex) => indexKeys(file, fileIndex));
    assertSameKeySets(tables.map((table) => new Set(table.keys())));

    const stats: Stats = new Map();
    for (const key of tables[0].keys()) {
      const pooled: number[] = [];
      tables.forEach((table, fileIndex) => {
        const value = table.get(key);
        if (value === undefined) {
          throw new KeyMismatchError(fileIndex, [key], []);
        }
        for (const sample of requireNumberList(value, { fileIndex, key })) {
          pooled.push(sample);
        }
      });
      stats.set(toStatKey(key), summarize(pooled));
    }

    return { stats };
  },
};
