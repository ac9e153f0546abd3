/**
 * Packages Commands
 *
 * Print the resolved entries of a category, one installer line per entry.
 */

import { CATEGORIES } from "@/cli/features/manifest/types.js";
import { toLines } from "@/cli/features/projection/lines.js";
import { raw } from "@/cli/logger.js";
import {
  createRuntime,
  readGlobalOptions,
  runCommand,
  type GlobalOptions,
} from "@/cli/runtime.js";

import type { Command } from "commander";

/**
 * Resolve a category to installer lines
 * @param args - Configuration arguments
 * @param args.options - Global command line options
 * @param args.category - Category name; unsupported names yield no lines
 *
 * @returns Pipe-delimited lines
 */
export const listPackages = async (args: {
  options: GlobalOptions;
  category: string;
}): Promise<Array<string>> => {
  const { options, category } = args;
  const { session } = await createRuntime({ options });
  return session.resolveLines(category);
};

/**
 * Resolve the app store packages for the execution context
 * @param args - Configuration arguments
 * @param args.options - Global command line options
 *
 * @returns snap or flatpak lines, or none when there is no app store
 */
export const listAppStorePackages = async (args: {
  options: GlobalOptions;
}): Promise<Array<string>> => {
  const { session } = await createRuntime({ options: args.options });
  return toLines({ entries: session.getAppStorePackages() });
};

/**
 * Register the 'packages' and 'app-store-packages' commands with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerPackagesCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("packages")
    .description("Print resolved packages of a category, one per line")
    .argument("<category>", `One of: ${CATEGORIES.join(", ")}`)
    .action(async (category: string) => {
      await runCommand({
        action: async () => {
          const lines = await listPackages({
            options: readGlobalOptions({ program }),
            category,
          });
          for (const line of lines) {
            raw({ message: line });
          }
        },
      });
    });

  program
    .command("app-store-packages")
    .description("Print snap or flatpak packages for the host's app store")
    .action(async () => {
      await runCommand({
        action: async () => {
          const lines = await listAppStorePackages({
            options: readGlobalOptions({ program }),
          });
          for (const line of lines) {
            raw({ message: line });
          }
        },
      });
    });
};
