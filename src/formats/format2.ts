/**
 * Format 2: multi-column samples, nearest integer key
 *
 * Each key maps to a list of rows of n columns. Columns are pooled
 * separately and every column contributes a [mean, std] pair.
 */

import { ColumnCountMismatchError } from "../errors.js";
import { requireNumberRows } from "../record.js";
import { summarize } from "../statistics.js";
import type { FileData, FormatMerger, MergeResult, Stats } from "../types.js";
import { checkFeatures, checkInputs } from "./features.js";
import {
  assertSameKeyCount,
  indexIntegerKeys,
  resolveNearestKeys,
  sortedKeys,
} from "./keys.js";

export const format2: FormatMerger = {
  id: 2,
  label: "multi-column-nearest",
  description:
    "like format 1, but each sample is a row of several values; every " +
    "column is combined into its own statistic.",
  requiresFeatures: false,

  merge(files: readonly FileData[], features?: readonly string[]): MergeResult {
    checkFeatures(format2, features);
    checkInputs(files);

    const tables = files.map((file, fileIndex) => {
      const rows = new Map<number, number[][]>();
      for (const [key, value] of indexIntegerKeys(file, fileIndex)) {
        rows.set(key, requireNumberRows(value, { fileIndex, key }));
      }
      return rows;
    });
    const keyLists = tables.map(sortedKeys);
    assertSameKeyCount(keyLists);

    const canonicalKeys = keyLists[0];
    const nColumns = countColumns(tables, canonicalKeys);

    const matches = resolveNearestKeys(canonicalKeys, keyLists);
    const stats: Stats = new Map();
    canonicalKeys.forEach((key, row) => {
      const columns: number[][] = Array.from({ length: nColumns }, () => []);
      matches[row].forEach((localKey, fileIndex) => {
        for (const sample of tables[fileIndex].get(localKey) ?? []) {
          sample.forEach((value, column) => columns[column].push(value));
        }
      });
      stats.set(
        key,
        columns.flatMap((column) => summarize(column))
      );
    });

    return { stats };
  },
};

/**
 * Column count of the first sample of the first canonical key, checked
 * against every sample of every file
 */
function countColumns(
  tables: ReadonlyArray<ReadonlyMap<number, number[][]>>,
  canonicalKeys: readonly number[]
): number {
  const firstKey = canonicalKeys[0];
  const firstSample =
    firstKey === undefined ? undefined : tables[0].get(firstKey)?.[0];
  if (firstSample === undefined) {
    throw new ColumnCountMismatchError(
      "Cannot count columns: the first key of the first file has no samples"
    );
  }

  const nColumns = firstSample.length;
  tables.forEach((table, fileIndex) => {
    for (const [key, samples] of table) {
      for (const sample of samples) {
        if (sample.length !== nColumns) {
          throw new ColumnCountMismatchError(
            `Not all samples contain ${nColumns} columns: key ${key} of file ${fileIndex} has ${sample.length}`,
            nColumns,
            sample.length,
            { fileIndex, key }
          );
        }
      }
    }
  });
  return nColumns;
}
