/**
 * Input discovery
 *
 * Inputs may be files or run directories. Directories are searched
 * recursively for files whose base name matches a glob pattern
 * (minimatch syntax).
 */

import * as fs from "fs";
import { minimatch } from "minimatch";
import * as path from "path";
import { LoaderError, NoInputError } from "./errors.js";

/**
 * Whether a base name matches a file-name glob
 */
export function matchesPattern(name: string, pattern: string): boolean {
  return minimatch(name, pattern, { dot: false });
}

function findFiles(dir: string, pattern: string, found: string[]): void {
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      findFiles(fullPath, pattern, found);
    } else if (entry.isFile() && matchesPattern(entry.name, pattern)) {
      found.push(fullPath);
    }
  }
}

/**
 * Expand inputs into the list of files to merge
 *
 * Files are kept in the given order; each directory is replaced by its
 * matching files, walked depth first in sorted name order.
 *
 * @throws LoaderError if an input does not exist
 * @throws NoInputError if nothing is left to merge
 */
export function discoverInputs(
  inputs: readonly string[],
  pattern: string
): string[] {
  const files: string[] = [];

  for (const input of inputs) {
    if (!fs.existsSync(input)) {
      throw new LoaderError("Input file not found", input);
    }
    if (fs.statSync(input).isDirectory()) {
      findFiles(input, pattern, files);
    } else {
      files.push(input);
    }
  }

  if (files.length === 0) {
    throw new NoInputError(inputs);
  }
  return files;
}
