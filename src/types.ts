/**
 * Core type definitions for logmerge
 */

import type { DataValue } from "./record.js";

/**
 * Supported merge formats
 *
 * 0: flat mapping, keys must match exactly
 * 1: flat mapping with integer keys, nearest key is matched
 * 2: like 1, but every sample is a row of several columns
 * 3: sequence of nested records, selected features are extracted per step
 */
export type FormatId = 0 | 1 | 2 | 3;

export const FORMAT_IDS: readonly FormatId[] = [0, 1, 2, 3];

/**
 * Supported loader names
 */
export type LoaderName = "yaml" | "json_lastrow" | "json_rows";

export const LOADER_NAMES: readonly LoaderName[] = [
  "yaml",
  "json_lastrow",
  "json_rows",
];

/**
 * One input file after loading
 */
export type FileData = DataValue;

/**
 * Keys of the output statistics. Format 0 keeps the file's own keys,
 * the other formats use integer keys or step indices.
 */
export type StatKey = string | number;

/**
 * Canonical key -> [mean, std, mean, std, ...]
 */
export type Stats = Map<StatKey, number[]>;

/**
 * Result of a single merge
 */
export interface MergeResult {
  stats: Stats;
  /** Feature display names, only produced by format 3 */
  header?: string[];
}

/**
 * A merge strategy for one input format
 */
export interface FormatMerger {
  readonly id: FormatId;
  /** Short label shown in help and summaries */
  readonly label: string;
  readonly description: string;
  /** Whether the format needs a non-empty feature list (true) or forbids one (false) */
  readonly requiresFeatures: boolean;
  merge(files: readonly FileData[], features?: readonly string[]): MergeResult;
}

/**
 * A strategy that turns a file path into FileData
 */
export interface Loader {
  readonly name: LoaderName;
  readonly description: string;
  /** Default file-name pattern used when an input is a directory */
  readonly defaultPattern: string;
  load(filePath: string): FileData;
}
