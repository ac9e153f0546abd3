/**
 * Tool Version Command
 *
 * Prints the version pinned for a tool in custom or mise sections.
 */

import { raw } from "@/cli/logger.js";
import {
  createRuntime,
  readGlobalOptions,
  runCommand,
} from "@/cli/runtime.js";

import type { Command } from "commander";

/**
 * Register the 'tool-version' command with commander
 * Exits with status 1 and no output when no version is pinned.
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerToolVersionCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("tool-version")
    .description("Print the version pinned for a tool")
    .argument("<name>", "Tool name, e.g. node or mise")
    .action(async (name: string) => {
      await runCommand({
        action: async () => {
          const { session } = await createRuntime({
            options: readGlobalOptions({ program }),
          });
          const version = session.getToolVersion(name);
          if (version === "") {
            process.exitCode = 1;
            return;
          }
          raw({ message: version });
        },
      });
    });
};
