/**
 * Registry of the supported merge formats
 */

import { UnsupportedFormatError } from "../errors.js";
import { StrategyRegistry } from "../registry.js";
import { FORMAT_IDS, type FormatId, type FormatMerger } from "../types.js";
import { format0 } from "./format0.js";
import { format1 } from "./format1.js";
import { format2 } from "./format2.js";
import { format3 } from "./format3.js";

export const formatRegistry = new StrategyRegistry<FormatId, FormatMerger>("Format")
  .register(format0.id, format0)
  .register(format1.id, format1)
  .register(format2.id, format2)
  .register(format3.id, format3)
  .seal();

export function isFormatId(value: number): value is FormatId {
  return FORMAT_IDS.some((id) => id === value);
}

/**
 * Look up a merger by id. Accepts the raw command-line string.
 *
 * @throws UnsupportedFormatError if the id is not registered
 */
export function getFormatMerger(format: number | string): FormatMerger {
  const id =
    typeof format === "number"
      ? format
      : /^[0-9]$/.test(format)
        ? Number(format)
        : NaN;
  const merger = isFormatId(id) ? formatRegistry.get(id) : undefined;
  if (!merger) {
    throw new UnsupportedFormatError(String(format), formatRegistry.keys());
  }
  return merger;
}
