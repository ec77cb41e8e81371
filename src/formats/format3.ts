/**
 * Format 3: per-step nested records, selected features
 *
 * Each file is a sequence of records, one per step. For every requested
 * feature path the value at each step is collected from all files.
 */

import {
  keyedEntries,
  requireNumber,
  walkPath,
  type DataValue,
} from "../record.js";
import { summarize } from "../statistics.js";
import type { FileData, FormatMerger, MergeResult, Stats } from "../types.js";
import {
  checkFeatures,
  checkInputs,
  featureName,
  parseFeaturePath,
} from "./features.js";
import {
  assertSameStepCount,
  indexIntegerKeys,
  sortedEntries,
} from "./keys.js";

export const format3: FormatMerger = {
  id: 3,
  label: "nested-features",
  description:
    "each file is a sequence of records, one per step (e.g. one JSON object " +
    "per line); the values selected with --feature are combined per step. " +
    "All files must have the same number of steps.",
  requiresFeatures: true,

  merge(files: readonly FileData[], features?: readonly string[]): MergeResult {
    const selected = checkFeatures(format3, features);
    checkInputs(files);

    const paths = selected.map(parseFeaturePath);
    const header = selected.map(featureName);

    const steps = files.map((file, fileIndex) => stepsOf(file, fileIndex));
    assertSameStepCount(steps.map((fileSteps) => fileSteps.length));

    const stats: Stats = new Map();
    const nSteps = steps[0].length;
    for (let step = 0; step < nSteps; step++) {
      const row: number[] = [];
      for (const path of paths) {
        const values = steps.map((fileSteps, fileIndex) => {
          const location = { fileIndex, key: step };
          return requireNumber(walkPath(fileSteps[step], path, location), location);
        });
        row.push(...summarize(values));
      }
      stats.set(step, row);
    }

    return { stats, header };
  },
};

/**
 * Records of a file in step order. A mapping is read in ascending
 * integer-key order.
 */
function stepsOf(file: FileData, fileIndex: number): DataValue[] {
  if (file.kind === "mapping") {
    return sortedEntries(indexIntegerKeys(file, fileIndex)).map(
      ([, record]) => record
    );
  }
  return keyedEntries(file, { fileIndex }).map(([, record]) => record);
}
