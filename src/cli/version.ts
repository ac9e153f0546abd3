/**
 * Package version lookup
 */

import { existsSync, readFileSync } from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

/**
 * Find the package.json that belongs to packplan, walking up from this module
 * @returns Absolute path to package.json, or null if not found
 */
const findPackageJson = (): string | null => {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  let previousDir = "";

  while (dir !== previousDir) {
    const candidate = path.join(dir, "package.json");
    if (existsSync(candidate)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
        if (
          pkg != null &&
          typeof pkg === "object" &&
          "name" in pkg &&
          pkg.name === "packplan"
        ) {
          return candidate;
        }
      } catch {
        // Unreadable package.json, keep walking
      }
    }
    previousDir = dir;
    dir = path.dirname(dir);
  }

  return null;
};

/**
 * Get the version of the running packplan package
 * @returns The version string, or null if it cannot be determined
 */
export const getCurrentPackageVersion = (): string | null => {
  const packageJsonPath = findPackageJson();
  if (packageJsonPath == null) {
    return null;
  }

  const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
  if (
    pkg != null &&
    typeof pkg === "object" &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return null;
};
