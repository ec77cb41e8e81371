/**
 * Key reconciliation across input files
 */

import {
  InvalidKeyError,
  KeyCountMismatchError,
  KeyMismatchError,
  StepCountMismatchError,
} from "../errors.js";
import { keyedEntries, type DataValue } from "../record.js";
import type { FileData, StatKey } from "../types.js";

const INTEGER_KEY = /^(0|-?[1-9]\d*)$/;

/**
 * Whether a key is the canonical spelling of a safe integer
 */
export function isIntegerKey(key: string): boolean {
  return INTEGER_KEY.test(key) && Number.isSafeInteger(Number(key));
}

/**
 * Output key for a file key: integer keys become numbers so that they sort
 * numerically and are written unquoted
 */
export function toStatKey(key: string): StatKey {
  return isIntegerKey(key) ? Number(key) : key;
}

/**
 * Index a file by its own string keys
 */
export function indexKeys(
  file: FileData,
  fileIndex: number
): Map<string, DataValue> {
  return new Map(keyedEntries(file, { fileIndex }));
}

/**
 * Index a file by integer keys
 *
 * @throws InvalidKeyError if a key is not a canonical integer
 */
export function indexIntegerKeys(
  file: FileData,
  fileIndex: number
): Map<number, DataValue> {
  const table = new Map<number, DataValue>();
  for (const [key, value] of keyedEntries(file, { fileIndex })) {
    if (!isIntegerKey(key)) {
      throw new InvalidKeyError(key, fileIndex);
    }
    table.set(Number(key), value);
  }
  return table;
}

export function sortedKeys(table: ReadonlyMap<number, unknown>): number[] {
  return [...table.keys()].sort((a, b) => a - b);
}

export function sortedEntries<V>(table: ReadonlyMap<number, V>): Array<[number, V]> {
  return [...table].sort(([a], [b]) => a - b);
}

/**
 * Every file must have exactly the key set of the first one
 */
export function assertSameKeySets(
  keySets: ReadonlyArray<ReadonlySet<string>>
): void {
  const [reference] = keySets;
  if (reference === undefined) return;
  keySets.forEach((keys, fileIndex) => {
    const missing = [...reference].filter((key) => !keys.has(key));
    const extra = [...keys].filter((key) => !reference.has(key));
    if (missing.length > 0 || extra.length > 0) {
      throw new KeyMismatchError(fileIndex, missing, extra);
    }
  });
}

/**
 * Every file must have as many keys as the first one
 */
export function assertSameKeyCount(
  keyLists: ReadonlyArray<readonly number[]>
): void {
  const [reference] = keyLists;
  if (reference === undefined) return;
  keyLists.forEach((keys, fileIndex) => {
    if (keys.length !== reference.length) {
      throw new KeyCountMismatchError(fileIndex, reference.length, keys.length);
    }
  });
}

/**
 * Every file must have as many steps as the first one
 */
export function assertSameStepCount(counts: readonly number[]): void {
  const [reference] = counts;
  if (reference === undefined) return;
  counts.forEach((count, fileIndex) => {
    if (count !== reference) {
      throw new StepCountMismatchError(fileIndex, reference, count);
    }
  });
}

/**
 * Return the candidate closest to target.
 * Candidates are scanned in order and the first minimum wins, so on a sorted
 * list a tie resolves to the lower key.
 */
export function nearestKey(target: number, candidates: readonly number[]): number {
  let best: number | undefined;
  let bestDistance = Infinity;
  for (const candidate of candidates) {
    const distance = Math.abs(target - candidate);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  if (best === undefined) {
    throw new Error(`No candidate key to match ${target}`);
  }
  return best;
}

/**
 * For every canonical key, the matching local key of every file
 *
 * @returns rows indexed like canonicalKeys, columns indexed like keyLists
 */
export function resolveNearestKeys(
  canonicalKeys: readonly number[],
  keyLists: ReadonlyArray<readonly number[]>
): number[][] {
  return canonicalKeys.map((key) =>
    keyLists.map((fileKeys) => nearestKey(key, fileKeys))
  );
}
