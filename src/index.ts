/**
 * logmerge - merge repeated experiment logs into mean/std statistics
 */

export * from "./types.js";
export * from "./errors.js";
export {
  toDataValue,
  walkPath,
  keyedEntries,
  scalar,
  sequence,
  mapping,
  type DataValue,
  type Scalar,
} from "./record.js";
export { mean, populationStd, summarize } from "./statistics.js";
export { StrategyRegistry } from "./registry.js";
export * from "./formats/index.js";
export {
  yamlLoader,
  jsonLastRowLoader,
  jsonRowsLoader,
  loaderRegistry,
  getLoader,
  isLoaderName,
} from "./loaders.js";
export {
  renderStatsCsv,
  writeStatsCsv,
  statsToRows,
  compareStatKeys,
} from "./csv-writer.js";
export { discoverInputs, matchesPattern } from "./discovery.js";
export {
  loadConfig,
  validateConfig,
  CONFIG_FILENAME,
  type LogmergeConfig,
} from "./config.js";
export {
  mergeLogs,
  planMerge,
  runMerge,
  type MergeLogsOptions,
  type MergeLogsResult,
  type MergePlan,
} from "./merge.js";
