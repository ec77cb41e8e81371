/**
 * Feature selection checks shared by the mergers
 */

import { FeatureNotAllowedError, NoInputError } from "../errors.js";
import type { FileData, FormatMerger } from "../types.js";

/**
 * Check a feature list against what a format accepts
 *
 * @returns the feature list, empty for formats that forbid features
 */
export function checkFeatures(
  merger: Pick<FormatMerger, "id" | "requiresFeatures">,
  features: readonly string[] | undefined
): readonly string[] {
  const selected = features ?? [];
  if (merger.requiresFeatures && selected.length === 0) {
    throw new FeatureNotAllowedError(merger.id, "required");
  }
  if (!merger.requiresFeatures && selected.length > 0) {
    throw new FeatureNotAllowedError(merger.id, "forbidden");
  }
  return selected;
}

export function checkInputs(files: readonly FileData[]): void {
  if (files.length === 0) {
    throw new NoInputError([]);
  }
}

/**
 * Split a feature path like "metrics,loss" into its segments
 */
export function parseFeaturePath(feature: string): string[] {
  return feature.split(",");
}

/**
 * Display name of a feature: its last path segment
 */
export function featureName(feature: string): string {
  const segments = parseFeaturePath(feature);
  return segments[segments.length - 1];
}
