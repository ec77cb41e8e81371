/**
 * Error types for merge operations
 *
 * Every failure is fatal: errors carry a stable code and enough context
 * for the CLI to point at the offending file.
 */

import type { FormatId, StatKey } from "./types.js";

export type MergeErrorCode =
  | "KEY_MISMATCH"
  | "KEY_COUNT_MISMATCH"
  | "COLUMN_COUNT_MISMATCH"
  | "STEP_COUNT_MISMATCH"
  | "PATH_NOT_FOUND"
  | "UNSUPPORTED_FORMAT"
  | "UNSUPPORTED_LOADER"
  | "FEATURE_NOT_ALLOWED"
  | "INVALID_KEY"
  | "NON_NUMERIC_VALUE"
  | "NO_INPUT"
  | "LOAD_FAILED"
  | "CONFIG_INVALID";

/**
 * Where in the input a value was read from
 */
export interface ValueLocation {
  /** Position of the file in the merged input list */
  fileIndex: number;
  /** Key or step the value belongs to */
  key?: StatKey;
}

/**
 * Base class for all merge-related errors
 */
export class MergeError extends Error {
  constructor(message: string, public readonly code: MergeErrorCode) {
    super(message);
    this.name = "MergeError";
    Object.setPrototypeOf(this, MergeError.prototype);
  }
}

/**
 * Format 0 files disagree on their key sets
 */
export class KeyMismatchError extends MergeError {
  constructor(
    public readonly fileIndex: number,
    public readonly missingKeys: string[],
    public readonly extraKeys: string[]
  ) {
    super(`Keys differ between files 0 and ${fileIndex}`, "KEY_MISMATCH");
    this.name = "KeyMismatchError";
    Object.setPrototypeOf(this, KeyMismatchError.prototype);
  }
}

/**
 * Format 1/2 files disagree on their number of keys
 */
export class KeyCountMismatchError extends MergeError {
  constructor(
    public readonly fileIndex: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Number of keys differs between files 0 and ${fileIndex} (${expected} vs ${actual})`,
      "KEY_COUNT_MISMATCH"
    );
    this.name = "KeyCountMismatchError";
    Object.setPrototypeOf(this, KeyCountMismatchError.prototype);
  }
}

/**
 * Format 2 samples disagree on their number of columns
 */
export class ColumnCountMismatchError extends MergeError {
  constructor(
    message: string,
    public readonly expected?: number,
    public readonly actual?: number,
    public readonly location?: ValueLocation
  ) {
    super(message, "COLUMN_COUNT_MISMATCH");
    this.name = "ColumnCountMismatchError";
    Object.setPrototypeOf(this, ColumnCountMismatchError.prototype);
  }
}

/**
 * Format 3 files disagree on their number of steps
 */
export class StepCountMismatchError extends MergeError {
  constructor(
    public readonly fileIndex: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Not all files contain ${expected} steps: file ${fileIndex} has ${actual}`,
      "STEP_COUNT_MISMATCH"
    );
    this.name = "StepCountMismatchError";
    Object.setPrototypeOf(this, StepCountMismatchError.prototype);
  }
}

/**
 * A nested feature path cannot be resolved against a record
 */
export class PathNotFoundError extends MergeError {
  constructor(
    public readonly path: readonly string[],
    /** Index of the segment that could not be resolved */
    public readonly depth: number,
    public readonly location?: ValueLocation
  ) {
    super(
      `Cannot resolve '${path[depth]}' in path ${path.join(",")}`,
      "PATH_NOT_FOUND"
    );
    this.name = "PathNotFoundError";
    Object.setPrototypeOf(this, PathNotFoundError.prototype);
  }
}

export class UnsupportedFormatError extends MergeError {
  constructor(
    public readonly format: string,
    public readonly supported: readonly FormatId[]
  ) {
    super(`Format ${format} not supported`, "UNSUPPORTED_FORMAT");
    this.name = "UnsupportedFormatError";
    Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
  }
}

export class UnsupportedLoaderError extends MergeError {
  constructor(
    public readonly loader: string,
    public readonly supported: readonly string[]
  ) {
    super(`Loader '${loader}' not supported`, "UNSUPPORTED_LOADER");
    this.name = "UnsupportedLoaderError";
    Object.setPrototypeOf(this, UnsupportedLoaderError.prototype);
  }
}

/**
 * Features were given to a format that cannot select them,
 * or omitted for one that needs them
 */
export class FeatureNotAllowedError extends MergeError {
  constructor(
    public readonly format: FormatId,
    public readonly reason: "forbidden" | "required"
  ) {
    super(
      reason === "forbidden"
        ? `Format ${format} can only merge top-level values; features can't be selected`
        : `Format ${format} requires at least one feature`,
      "FEATURE_NOT_ALLOWED"
    );
    this.name = "FeatureNotAllowedError";
    Object.setPrototypeOf(this, FeatureNotAllowedError.prototype);
  }
}

/**
 * A key that should be an integer is not
 */
export class InvalidKeyError extends MergeError {
  constructor(public readonly key: string, public readonly fileIndex: number) {
    super(`Key '${key}' in file ${fileIndex} is not an integer`, "INVALID_KEY");
    this.name = "InvalidKeyError";
    Object.setPrototypeOf(this, InvalidKeyError.prototype);
  }
}

/**
 * A value does not have the numeric shape the format expects
 */
export class NonNumericValueError extends MergeError {
  constructor(message: string, public readonly location: ValueLocation) {
    super(message, "NON_NUMERIC_VALUE");
    this.name = "NonNumericValueError";
    Object.setPrototypeOf(this, NonNumericValueError.prototype);
  }
}

export class NoInputError extends MergeError {
  constructor(public readonly inputs: readonly string[]) {
    super(
      inputs.length === 0
        ? "No input files to merge"
        : `No input files found in: ${inputs.join(", ")}`,
      "NO_INPUT"
    );
    this.name = "NoInputError";
    Object.setPrototypeOf(this, NoInputError.prototype);
  }
}

/**
 * A file could not be read or parsed
 */
export class LoaderError extends MergeError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly originalError?: Error
  ) {
    super(message, "LOAD_FAILED");
    this.name = "LoaderError";
    Object.setPrototypeOf(this, LoaderError.prototype);
  }
}

export class ConfigError extends MergeError {
  constructor(
    message: string,
    public readonly errors: readonly string[] = []
  ) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isMergeError(error: unknown): error is MergeError {
  return error instanceof MergeError;
}

/**
 * Format error message with consistent styling
 *
 * Format:
 * ✗ Error Title
 *
 *   Detailed explanation of what went wrong
 *
 *   Suggested action:
 *     command to run or steps to take
 */
export interface FormattedError {
  title: string;
  explanation: string;
  action?: string;
  command?: string;
  context?: string;
}

/**
 * Format a merge error for CLI output
 *
 * @param files - The merged input files, used to name the file behind
 *   index-based errors
 */
export function formatErrorMessage(
  error: unknown,
  files: readonly string[] = []
): string {
  const fileContext = (fileIndex: number | undefined): string | undefined => {
    if (fileIndex === undefined) return undefined;
    const file = files[fileIndex];
    return file === undefined ? `file #${fileIndex}` : `${file} (file #${fileIndex})`;
  };

  if (error instanceof KeyMismatchError) {
    const details: string[] = [];
    if (error.missingKeys.length > 0) {
      details.push(`missing: ${error.missingKeys.join(", ")}`);
    }
    if (error.extraKeys.length > 0) {
      details.push(`unexpected: ${error.extraKeys.join(", ")}`);
    }
    return formatErrorOutput({
      title: "Input files have different keys",
      explanation: `${error.message}${details.length > 0 ? ` (${details.join("; ")})` : ""}`,
      context: fileContext(error.fileIndex),
      action: "If keys are steps or timestamps that drift between runs",
      command: "use --format 1 to match the nearest key",
    });
  }

  if (
    error instanceof KeyCountMismatchError ||
    error instanceof StepCountMismatchError
  ) {
    return formatErrorOutput({
      title:
        error instanceof KeyCountMismatchError
          ? "Input files have a different number of keys"
          : "Input files have a different number of steps",
      explanation: error.message,
      context: fileContext(error.fileIndex),
      action: "Check that every run finished",
    });
  }

  if (
    error instanceof ColumnCountMismatchError ||
    error instanceof NonNumericValueError
  ) {
    return formatErrorOutput({
      title:
        error instanceof ColumnCountMismatchError
          ? "Samples have a different number of columns"
          : "Unexpected value in input",
      explanation: error.message,
      context: fileContext(error.location?.fileIndex),
    });
  }

  if (error instanceof PathNotFoundError) {
    return formatErrorOutput({
      title: `Feature '${error.path.join(",")}' not found`,
      explanation: error.message,
      context: fileContext(error.location?.fileIndex),
      action: "Feature paths are comma-separated keys, for example",
      command: "--feature metrics,loss",
    });
  }

  if (error instanceof InvalidKeyError) {
    return formatErrorOutput({
      title: "Keys must be integers for this format",
      explanation: error.message,
      context: fileContext(error.fileIndex),
      action: "To merge arbitrary keys",
      command: "use --format 0",
    });
  }

  if (error instanceof UnsupportedFormatError) {
    return formatErrorOutput({
      title: error.message,
      explanation: `Supported formats: ${error.supported.join(", ")}`,
      action: "To see what each format expects",
      command: "logmerge --help",
    });
  }

  if (error instanceof UnsupportedLoaderError) {
    return formatErrorOutput({
      title: error.message,
      explanation: `Supported loaders: ${error.supported.join(", ")}`,
    });
  }

  if (error instanceof FeatureNotAllowedError) {
    return formatErrorOutput({
      title: "Invalid feature selection",
      explanation: error.message,
      action:
        error.reason === "required"
          ? "To select a feature"
          : "Remove the --feature options, or use",
      command: error.reason === "required" ? "--feature <key,key,...>" : "--format 3",
    });
  }

  if (error instanceof LoaderError) {
    return formatErrorOutput({
      title: `Failed to load ${error.path}`,
      explanation: error.message,
      context: error.originalError?.message,
    });
  }

  if (error instanceof ConfigError) {
    return formatErrorOutput({
      title: "Invalid configuration",
      explanation: [error.message, ...error.errors.map((e) => `• ${e}`)].join(
        "\n  "
      ),
    });
  }

  if (isMergeError(error)) {
    return formatErrorOutput({
      title: "Merge failed",
      explanation: error.message,
    });
  }

  if (error instanceof Error) {
    return formatErrorOutput({
      title: "An error occurred",
      explanation: error.message,
    });
  }

  return formatErrorOutput({
    title: "An unexpected error occurred",
    explanation: String(error),
  });
}

/**
 * Format error output with consistent structure
 */
function formatErrorOutput(error: FormattedError): string {
  const lines: string[] = [];

  lines.push(`✗ ${error.title}`);
  lines.push("");

  if (error.explanation) {
    lines.push(`  ${error.explanation}`);
    lines.push("");
  }

  if (error.context) {
    lines.push(`  Context: ${error.context}`);
    lines.push("");
  }

  if (error.action) {
    lines.push(`  ${error.action}:`);
    if (error.command) {
      lines.push(`    ${error.command}`);
    }
  }

  return lines.join("\n");
}
