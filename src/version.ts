/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the version from package.json
 */
export function getVersion(): string {
  // Both src/ and dist/ sit one level below package.json
  const packageJsonPath = path.join(__dirname, "..", "package.json");
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * The current version
 */
export const VERSION = getVersion();
