/**
 * CLI handler for the merge command
 */

import chalk from "chalk";
import * as fs from "fs";
import * as readline from "readline";
import { loadConfig } from "../config.js";
import { writeStatsCsv } from "../csv-writer.js";
import { ConfigError, formatErrorMessage, isMergeError } from "../errors.js";
import { planMerge, runMerge, type MergePlan } from "../merge.js";
import { describeValue } from "../record.js";

export interface MergeCommandOptions {
  format?: string;
  loader?: string;
  feature?: string[];
  out: string;
  pattern?: string;
  yes?: boolean;
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

export interface MergeCommandDeps {
  /** Ask the user a yes/no question; defaults to a readline prompt */
  confirm?: (message: string, output: NodeJS.WritableStream) => Promise<boolean>;
  /** Directory searched for the config file */
  cwd?: string;
}

/**
 * Summary printed with --json
 */
export interface MergeSummary {
  out: string;
  format: number;
  loader: string;
  files: string[];
  keys: number;
  columns: number;
  header: string[] | null;
}

/**
 * Prompt user for confirmation
 * @returns true for an empty answer, y or Y
 */
export async function promptConfirmation(
  message: string,
  output: NodeJS.WritableStream = process.stdout,
  input: NodeJS.ReadableStream = process.stdin
): Promise<boolean> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    rl.question(message, (answer) => {
      rl.close();
      resolve(["", "y", "Y"].includes(answer.trim()));
    });
  });
}

/**
 * Handle the merge command
 *
 * Validates options, asks before overwriting, loads and merges the inputs
 * and writes the CSV. Any failure exits with code 1 and leaves the output
 * untouched.
 */
export async function handleMerge(
  inputs: string[],
  options: MergeCommandOptions,
  deps: MergeCommandDeps = {}
): Promise<void> {
  const confirm = deps.confirm ?? promptConfirmation;
  let plan: MergePlan | undefined;

  try {
    const { config, path: configPath, warnings } = loadConfig({
      cwd: deps.cwd,
      configPath: options.config,
    });
    if (!options.json) {
      for (const warning of warnings) {
        console.error(chalk.yellow(`⚠ ${configPath}: ${warning}`));
      }
    }

    const format = options.format ?? config.format;
    if (format === undefined) {
      throw new ConfigError(
        "No format selected: pass --format or set \"format\" in the config file"
      );
    }
    const loader = options.loader ?? config.loader;
    if (loader === undefined) {
      throw new ConfigError(
        "No loader selected: pass --loader or set \"loader\" in the config file"
      );
    }
    const features =
      options.feature && options.feature.length > 0
        ? options.feature
        : config.features;

    plan = planMerge({
      format,
      loader,
      features,
      inputs,
      pattern: options.pattern ?? config.pattern,
    });

    if (fs.existsSync(options.out) && !(options.yes || config.overwrite)) {
      // stdout is reserved for the summary under --json
      const confirmed = await confirm(
        `Should I overwrite existing ${options.out}? (Y/n) `,
        options.json ? process.stderr : process.stdout
      );
      if (!confirmed) {
        if (!options.json) {
          console.log(chalk.yellow(`⚠ Aborted; ${options.out} left unchanged`));
        }
        return;
      }
    }

    const result = runMerge(plan, {
      onFileLoaded: (filePath, data) => {
        if (options.verbose && !options.json) {
          console.log(chalk.gray(`  loaded ${filePath}: ${describeValue(data)}`));
        }
      },
    });

    writeStatsCsv(options.out, result);

    const firstRow = result.stats.values().next();
    const summary: MergeSummary = {
      out: options.out,
      format: plan.merger.id,
      loader: plan.loader.name,
      files: plan.files,
      keys: result.stats.size,
      columns: firstRow.done ? 0 : firstRow.value.length,
      header: result.header ?? null,
    };

    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    console.log(
      chalk.green(`✓ Merged ${summary.files.length} files into`),
      chalk.cyan(summary.out)
    );
    console.log(
      chalk.gray(
        `  Format ${summary.format} (${plan.merger.label}), loader ${summary.loader}`
      )
    );
    console.log(
      chalk.gray(`  ${summary.keys} keys, ${summary.columns} statistics per key`)
    );
  } catch (error) {
    if (options.json) {
      console.error(
        JSON.stringify({
          error: error instanceof Error ? error.message : String(error),
          code: isMergeError(error) ? error.code : null,
        })
      );
    } else {
      console.error(chalk.red(formatErrorMessage(error, plan?.files)));
    }
    process.exit(1);
  }
}
