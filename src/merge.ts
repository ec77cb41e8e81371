/**
 * Merge operations
 *
 * Ties the pieces together: format and loader lookup, input discovery,
 * loading and merging. Nothing is written here.
 */

import { discoverInputs } from "./discovery.js";
import { checkFeatures } from "./formats/features.js";
import { getFormatMerger } from "./formats/registry.js";
import { getLoader } from "./loaders.js";
import type {
  FileData,
  FormatMerger,
  Loader,
  MergeResult,
} from "./types.js";

export interface MergeLogsOptions {
  format: number | string;
  loader: string;
  features?: readonly string[];
  /** Input files or run directories */
  inputs: readonly string[];
  /** File-name pattern for directory inputs (default: the loader's) */
  pattern?: string;
}

/**
 * A validated merge, ready to run
 */
export interface MergePlan {
  merger: FormatMerger;
  loader: Loader;
  features: readonly string[];
  files: string[];
}

export interface MergeLogsResult extends MergeResult {
  plan: MergePlan;
}

export interface MergeHooks {
  /** Called after each file is loaded */
  onFileLoaded?: (filePath: string, data: FileData) => void;
}

/**
 * Resolve format, loader and inputs. Option errors surface here, before any
 * file is read.
 */
export function planMerge(options: MergeLogsOptions): MergePlan {
  const merger = getFormatMerger(options.format);
  const loader = getLoader(options.loader);
  const features = checkFeatures(merger, options.features);
  const files = discoverInputs(
    options.inputs,
    options.pattern ?? loader.defaultPattern
  );
  return { merger, loader, features, files };
}

/**
 * Load every file of a plan and merge them
 */
export function runMerge(plan: MergePlan, hooks: MergeHooks = {}): MergeLogsResult {
  const data = plan.files.map((filePath) => {
    const fileData = plan.loader.load(filePath);
    hooks.onFileLoaded?.(filePath, fileData);
    return fileData;
  });
  const result = plan.merger.merge(data, plan.features);
  return { ...result, plan };
}

export function mergeLogs(
  options: MergeLogsOptions,
  hooks: MergeHooks = {}
): MergeLogsResult {
  return runMerge(planMerge(options), hooks);
}
