/**
 * Check Command
 *
 * Validates config.json and the manifest files without resolving anything.
 */

import { existsSync, readFileSync } from "fs";

import { getConfigPath, validateConfig } from "@/cli/config.js";
import {
  getMapAt,
  parseManifestText,
} from "@/cli/features/manifest/document.js";
import { readBaseManifest } from "@/cli/features/manifest/manifest.js";
import { error, info, newline, success, warn } from "@/cli/logger.js";
import {
  createRuntime,
  readGlobalOptions,
  runCommand,
  type GlobalOptions,
} from "@/cli/runtime.js";
import { normalizePath } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Outcome of one check
 * "warning" does not fail the run: a broken overlay is skipped at resolution.
 */
export type CheckResult = {
  name: string;
  status: "ok" | "warning" | "error";
  message: string;
  details?: Array<string> | null;
};

/**
 * Run all checks
 * @param args - Configuration arguments
 * @param args.options - Global command line options
 *
 * @returns One result per checked file
 */
export const runChecks = async (args: {
  options: GlobalOptions;
}): Promise<Array<CheckResult>> => {
  const { options } = args;
  const dotDir = normalizePath({ value: options.dotDir });
  const results: Array<CheckResult> = [];

  const configValidation = await validateConfig({ dotDir });
  results.push({
    name: getConfigPath({ dotDir }),
    status: configValidation.valid ? "ok" : "error",
    message: configValidation.message,
    details: configValidation.errors,
  });

  const { store } = await createRuntime({ options });

  try {
    const manifest = readBaseManifest({ manifestPath: store.manifestPath });
    const packCount = getMapAt({ node: manifest, path: ["packs"] })?.size ?? 0;
    results.push({
      name: store.manifestPath,
      status: "ok",
      message: `Package configuration is valid (${packCount} packs)`,
    });
  } catch (err) {
    results.push({
      name: store.manifestPath,
      status: "error",
      message: err instanceof Error ? err.message : String(err),
    });
  }

  if (store.overlayPath != null) {
    if (!existsSync(store.overlayPath)) {
      results.push({
        name: store.overlayPath,
        status: "warning",
        message: "Custom package overlay not found, base packages only",
      });
    } else {
      try {
        parseManifestText({ text: readFileSync(store.overlayPath, "utf-8") });
        results.push({
          name: store.overlayPath,
          status: "ok",
          message: "Custom package overlay is valid",
        });
      } catch (err) {
        results.push({
          name: store.overlayPath,
          status: "warning",
          message: `Custom package overlay will be skipped: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    }
  }

  return results;
};

/**
 * Register the 'check' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerCheckCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("check")
    .description("Validate config.json, packages.yaml and the custom overlay")
    .action(async () => {
      await runCommand({
        action: async () => {
          const results = await runChecks({
            options: readGlobalOptions({ program }),
          });

          newline();
          for (const result of results) {
            info({ message: result.name });
            const report = { message: `  ${result.message}` };
            if (result.status === "ok") {
              success(report);
            } else if (result.status === "warning") {
              warn(report);
            } else {
              error(report);
            }
            for (const detail of result.details ?? []) {
              info({ message: `    - ${detail}` });
            }
          }
          newline();

          if (results.some((result) => result.status === "error")) {
            process.exitCode = 1;
          }
        },
      });
    });
};
