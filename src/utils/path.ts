/**
 * Path utility functions for user-supplied directories
 */

import * as os from "os";
import * as path from "path";

/**
 * Normalize a user-supplied path
 * @param args - Configuration arguments
 * @param args.value - The path as given (optional)
 * @param args.baseDir - Directory relative paths are resolved against (defaults to process.cwd())
 *
 * @returns Absolute normalized path; baseDir when no value is given
 */
export const normalizePath = (args: {
  value?: string | null;
  baseDir?: string | null;
}): string => {
  const { value } = args;
  const baseDir = args.baseDir || process.cwd();

  if (value == null || value === "") {
    return baseDir;
  }

  let normalizedPath = value;

  // Expand tilde to home directory
  if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(os.homedir(), normalizedPath.slice(2));
  } else if (normalizedPath === "~") {
    normalizedPath = os.homedir();
  }

  if (!path.isAbsolute(normalizedPath)) {
    normalizedPath = path.join(baseDir, normalizedPath);
  }

  // Resolves . and .., collapses repeated slashes
  normalizedPath = path.normalize(normalizedPath);

  if (normalizedPath.length > 1 && normalizedPath.endsWith("/")) {
    normalizedPath = normalizedPath.slice(0, -1);
  }

  return normalizedPath;
};
