#!/usr/bin/env node

/**
 * logmerge CLI - merge repeated experiment logs into mean/std statistics
 */

import { Command } from "commander";
import { handleMerge, type MergeCommandOptions } from "./cli/merge-commands.js";
import { formatRegistry } from "./formats/registry.js";
import { loaderRegistry } from "./loaders.js";
import { VERSION } from "./version.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const formatHelp = [
  "Select the format of the input log files.",
  ...formatRegistry
    .values()
    .map((merger) => `Format ${merger.id}: ${merger.description}`),
].join("\n");

const loaderHelp = [
  "How to load input files.",
  ...loaderRegistry
    .values()
    .map((loader) => `'${loader.name}': ${loader.description}.`),
].join("\n");

const program = new Command();

program
  .name("logmerge")
  .description(
    "Merge multiple log files and save the mean and standard deviation of every key"
  )
  .version(VERSION)
  .option("-f, --format <id>", formatHelp)
  .option("-l, --loader <name>", loaderHelp)
  .option(
    "-n, --feature <path>",
    "Nested feature to extract (format 3), as comma-separated keys; repeat for more",
    collect,
    []
  )
  .requiredOption("-o, --out <path>", "Output csv file")
  .option("--pattern <glob>", "File-name pattern used for directory inputs")
  .option("-y, --yes", "Overwrite the output file without asking")
  .option("--json", "Output a JSON summary")
  .option("-v, --verbose", "Show every loaded file")
  .option("--config <path>", "Config file (default: ./logmerge.config.json)")
  .argument("<in_paths...>", "A sequence of input files or run directories")
  .action(async (inPaths: string[], options: MergeCommandOptions) => {
    await handleMerge(inPaths, options);
  });

await program.parseAsync(process.argv);
