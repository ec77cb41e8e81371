/**
 * Loaded record model
 *
 * Parsed YAML/JSON is converted into a tagged union so that the mergers can
 * narrow values explicitly instead of indexing untyped objects.
 */

import {
  NonNumericValueError,
  PathNotFoundError,
  type ValueLocation,
} from "./errors.js";

export type Scalar = number | string | boolean | null;

export type DataValue =
  | { kind: "mapping"; entries: Map<string, DataValue> }
  | { kind: "sequence"; items: DataValue[] }
  | { kind: "scalar"; value: Scalar };

export function scalar(value: Scalar): DataValue {
  return { kind: "scalar", value };
}

export function sequence(items: DataValue[]): DataValue {
  return { kind: "sequence", items };
}

export function mapping(entries: Iterable<[string, DataValue]>): DataValue {
  return { kind: "mapping", entries: new Map(entries) };
}

/**
 * Convert a value produced by JSON.parse or js-yaml into a DataValue
 *
 * YAML timestamps become ISO-8601 strings; anything else that is not plain
 * data is kept as its string form.
 */
export function toDataValue(raw: unknown): DataValue {
  if (raw === null || raw === undefined) {
    return scalar(null);
  }
  if (
    typeof raw === "number" ||
    typeof raw === "string" ||
    typeof raw === "boolean"
  ) {
    return scalar(raw);
  }
  if (Array.isArray(raw)) {
    return sequence(raw.map((item: unknown) => toDataValue(item)));
  }
  if (raw instanceof Date) {
    return scalar(raw.toISOString());
  }
  if (typeof raw === "object") {
    return mapping(
      Object.entries(raw).map(([key, value]): [string, DataValue] => [
        key,
        toDataValue(value),
      ])
    );
  }
  return scalar(String(raw));
}

/**
 * Return the keyed children of a mapping or sequence.
 * Sequence children are keyed by their 0-based index.
 */
export function keyedEntries(
  value: DataValue,
  location: ValueLocation
): Array<[string, DataValue]> {
  switch (value.kind) {
    case "mapping":
      return [...value.entries];
    case "sequence":
      return value.items.map((item, index): [string, DataValue] => [
        String(index),
        item,
      ]);
    case "scalar":
      throw new NonNumericValueError(
        `Expected a mapping or a sequence in file ${location.fileIndex}, got ${describeValue(value)}`,
        location
      );
  }
}

/**
 * Walk a nested path into a record
 *
 * Mapping children are looked up by key, sequence children by 0-based index.
 * An empty path returns the record itself.
 */
export function walkPath(
  root: DataValue,
  path: readonly string[],
  location?: ValueLocation
): DataValue {
  let current = root;
  for (let depth = 0; depth < path.length; depth++) {
    const next = childAt(current, path[depth]);
    if (next === undefined) {
      throw new PathNotFoundError(path, depth, location);
    }
    current = next;
  }
  return current;
}

function childAt(value: DataValue, segment: string): DataValue | undefined {
  switch (value.kind) {
    case "mapping":
      return value.entries.get(segment);
    case "sequence":
      if (!/^(0|[1-9]\d*)$/.test(segment)) return undefined;
      return value.items.at(Number(segment));
    case "scalar":
      return undefined;
  }
}

/**
 * Narrow a value to a number
 */
export function requireNumber(
  value: DataValue,
  location: ValueLocation
): number {
  if (value.kind === "scalar" && typeof value.value === "number") {
    return value.value;
  }
  throw new NonNumericValueError(
    `Expected a number${describeLocation(location)}, got ${describeValue(value)}`,
    location
  );
}

/**
 * Narrow a value to a list of numbers
 */
export function requireNumberList(
  value: DataValue,
  location: ValueLocation
): number[] {
  if (value.kind !== "sequence") {
    throw new NonNumericValueError(
      `Expected a list of numbers${describeLocation(location)}, got ${describeValue(value)}`,
      location
    );
  }
  return value.items.map((item) => requireNumber(item, location));
}

/**
 * Narrow a value to a list of numeric rows
 */
export function requireNumberRows(
  value: DataValue,
  location: ValueLocation
): number[][] {
  if (value.kind !== "sequence") {
    throw new NonNumericValueError(
      `Expected a list of rows${describeLocation(location)}, got ${describeValue(value)}`,
      location
    );
  }
  return value.items.map((item) => requireNumberList(item, location));
}

export function describeValue(value: DataValue): string {
  switch (value.kind) {
    case "mapping":
      return `a mapping with ${value.entries.size} keys`;
    case "sequence":
      return `a sequence of ${value.items.length} items`;
    case "scalar":
      return value.value === null ? "null" : `${typeof value.value} ${JSON.stringify(value.value)}`;
  }
}

function describeLocation(location: ValueLocation): string {
  return location.key === undefined
    ? ` in file ${location.fileIndex}`
    : ` at key ${JSON.stringify(location.key)} in file ${location.fileIndex}`;
}
