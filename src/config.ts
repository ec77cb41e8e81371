import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "./errors.js";

export const CONFIG_FILENAME = "logmerge.config.json";

/**
 * Defaults read from logmerge.config.json.
 * Command-line options take precedence over every field.
 */
export interface LogmergeConfig {
  /** Format id (0-3) */
  format?: number;
  /** Loader name */
  loader?: string;
  /** Feature paths for format 3 */
  features?: string[];
  /** File-name pattern for directory inputs */
  pattern?: string;
  /** Overwrite an existing output without asking */
  overwrite?: boolean;
}

/**
 * Result of validating a config object
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;
  /** Problems that must be fixed */
  errors: string[];
  /** Potential issues; the config is still usable */
  warnings: string[];
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Directory searched for logmerge.config.json (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
}

/**
 * Result of loading configuration with validation info
 */
export interface ConfigLoadResult {
  config: LogmergeConfig;
  /** File the config was read from, if any */
  path?: string;
  warnings: string[];
}

const KNOWN_FIELDS = new Set(["format", "loader", "features", "pattern", "overwrite"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config object and extract its typed fields
 */
export function validateConfig(
  raw: unknown
): ValidationResult & { config: LogmergeConfig } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: LogmergeConfig = {};

  if (!isPlainObject(raw)) {
    return {
      valid: false,
      errors: ["config must be a JSON object"],
      warnings,
      config,
    };
  }

  for (const field of Object.keys(raw)) {
    if (!KNOWN_FIELDS.has(field)) {
      warnings.push(`unknown field '${field}' is ignored`);
    }
  }

  const { format, loader, features, pattern, overwrite } = raw;

  if (format !== undefined) {
    if (typeof format === "number" && Number.isInteger(format)) {
      config.format = format;
    } else {
      errors.push("format must be an integer");
    }
  }

  if (loader !== undefined) {
    if (typeof loader === "string") {
      config.loader = loader;
    } else {
      errors.push("loader must be a string");
    }
  }

  if (features !== undefined) {
    if (
      Array.isArray(features) &&
      features.every((feature): feature is string => typeof feature === "string")
    ) {
      config.features = features;
    } else {
      errors.push("features must be an array of strings");
    }
  }

  if (pattern !== undefined) {
    if (typeof pattern === "string" && pattern.length > 0) {
      config.pattern = pattern;
    } else {
      errors.push("pattern must be a non-empty string");
    }
  }

  if (overwrite !== undefined) {
    if (typeof overwrite === "boolean") {
      config.overwrite = overwrite;
    } else {
      errors.push("overwrite must be a boolean");
    }
  }

  return { valid: errors.length === 0, errors, warnings, config };
}

/**
 * Load logmerge.config.json
 *
 * A missing default config file yields an empty config; a missing explicit
 * one is an error.
 *
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const configPath =
    options.configPath ?? path.join(options.cwd ?? process.cwd(), CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { config: {}, warnings: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(`Invalid config in ${configPath}`, result.errors);
  }

  return { config: result.config, path: configPath, warnings: result.warnings };
}
