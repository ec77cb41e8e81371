/**
 * CSV output for merged statistics
 *
 * Rows are written in ascending key order. Numbers are left unquoted, every
 * other field is quoted.
 */

import * as fs from "fs";
import * as path from "path";
import Papa from "papaparse";
import type { MergeResult, StatKey } from "./types.js";

export const CSV_NEWLINE = "\r\n";

type CsvField = string | number;

/**
 * Numbers first in numeric order, then strings by code unit
 */
export function compareStatKeys(a: StatKey, b: StatKey): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Header row for results that name their columns
 */
export function headerRow(header: readonly string[]): string[] {
  return ["step", ...header.flatMap((name) => [`${name}_mean`, `${name}_std`])];
}

export function statsToRows(result: MergeResult): CsvField[][] {
  const rows: CsvField[][] = [];
  if (result.header) {
    rows.push(headerRow(result.header));
  }
  const keys = [...result.stats.keys()].sort(compareStatKeys);
  for (const key of keys) {
    rows.push([key, ...(result.stats.get(key) ?? [])]);
  }
  return rows;
}

export function renderStatsCsv(result: MergeResult): string {
  const rows = statsToRows(result);
  if (rows.length === 0) {
    return "";
  }
  const text = Papa.unparse(rows, {
    quotes: (value: unknown) => typeof value !== "number",
    newline: CSV_NEWLINE,
  });
  return text + CSV_NEWLINE;
}

/**
 * Write the statistics to a CSV file, creating its directory if needed
 */
export function writeStatsCsv(outPath: string, result: MergeResult): void {
  const dir = path.dirname(outPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outPath, renderStatsCsv(result), "utf8");
}
