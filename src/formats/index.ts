export { format0 } from "./format0.js";
export { format1 } from "./format1.js";
export { format2 } from "./format2.js";
export { format3 } from "./format3.js";
export { formatRegistry, getFormatMerger, isFormatId } from "./registry.js";
export {
  checkFeatures,
  featureName,
  parseFeaturePath,
} from "./features.js";
export {
  assertSameKeyCount,
  assertSameKeySets,
  assertSameStepCount,
  nearestKey,
  resolveNearestKeys,
} from "./keys.js";
