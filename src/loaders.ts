/**
 * File loaders
 *
 * A loader turns one input file into FileData. The same loader is applied
 * to every input of a run.
 */

import * as fs from "fs";
import yaml from "js-yaml";
import { LoaderError, UnsupportedLoaderError } from "./errors.js";
import { sequence, toDataValue } from "./record.js";
import { StrategyRegistry } from "./registry.js";
import { LOADER_NAMES, type FileData, type Loader, type LoaderName } from "./types.js";

function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new LoaderError(
      `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

function parseJSON(text: string, filePath: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new LoaderError(
      `Failed to parse JSON at ${what}: ${parseError.message}`,
      filePath,
      parseError
    );
  }
}

/**
 * Non-empty lines of a file with their 1-based line numbers
 */
function contentLines(content: string): Array<{ line: string; lineNumber: number }> {
  return content
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line !== "");
}

/**
 * The whole file is a single YAML document
 */
export const yamlLoader: Loader = {
  name: "yaml",
  description: "the whole file is one YAML document",
  defaultPattern: "*.{yaml,yml}",

  load(filePath: string): FileData {
    const content = readSource(filePath);
    try {
      return toDataValue(yaml.load(content, { filename: filePath }));
    } catch (error) {
      const parseError = error instanceof Error ? error : new Error(String(error));
      throw new LoaderError(
        `Failed to parse YAML: ${parseError.message}`,
        filePath,
        parseError
      );
    }
  },
};

/**
 * Only the last row of the file is parsed, as one JSON value
 */
export const jsonLastRowLoader: Loader = {
  name: "json_lastrow",
  description: "the last row of the file is the JSON value to load",
  defaultPattern: "*.{json,jsonl}",

  load(filePath: string): FileData {
    const lines = contentLines(readSource(filePath));
    const last = lines[lines.length - 1];
    if (last === undefined) {
      throw new LoaderError("File is empty", filePath);
    }
    return toDataValue(parseJSON(last.line, filePath, `line ${last.lineNumber}`));
  },
};

/**
 * Every row of the file is one JSON value; rows are indexed from 0
 */
export const jsonRowsLoader: Loader = {
  name: "json_rows",
  description: "every row of the file is one JSON value, indexed from 0",
  defaultPattern: "*.{json,jsonl}",

  load(filePath: string): FileData {
    return sequence(
      contentLines(readSource(filePath)).map(({ line, lineNumber }) =>
        toDataValue(parseJSON(line, filePath, `line ${lineNumber}`))
      )
    );
  },
};

export const loaderRegistry = new StrategyRegistry<LoaderName, Loader>("Loader")
  .register(yamlLoader.name, yamlLoader)
  .register(jsonLastRowLoader.name, jsonLastRowLoader)
  .register(jsonRowsLoader.name, jsonRowsLoader)
  .seal();

export function isLoaderName(value: string): value is LoaderName {
  return LOADER_NAMES.some((name) => name === value);
}

/**
 * Look up a loader by name
 *
 * @throws UnsupportedLoaderError if the name is not registered
 */
export function getLoader(name: string): Loader {
  const loader = isLoaderName(name) ? loaderRegistry.get(name) : undefined;
  if (!loader) {
    throw new UnsupportedLoaderError(name, loaderRegistry.keys());
  }
  return loader;
}
