/**
 * Pack Commands
 *
 * List available packs, describe one pack, and list the runtimes the
 * selected packs bring in.
 */

import { toPackLines } from "@/cli/features/projection/lines.js";
import { raw } from "@/cli/logger.js";
import {
  createRuntime,
  readGlobalOptions,
  runCommand,
} from "@/cli/runtime.js";

import type { Command } from "commander";

/**
 * Register the 'packs', 'pack-contents' and 'runtimes' commands with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerPacksCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("packs")
    .description("List available packs as name|description")
    .action(async () => {
      await runCommand({
        action: async () => {
          const { session } = await createRuntime({
            options: readGlobalOptions({ program }),
          });
          for (const line of toPackLines({ packs: session.getAvailablePacks() })) {
            raw({ message: line });
          }
        },
      });
    });

  program
    .command("pack-contents")
    .description("Describe the tools a pack installs")
    .argument("<pack>", "Pack name")
    .option("--no-vscode", "Leave VS Code extensions out of the listing")
    .action(async (pack: string, options: { vscode: boolean }) => {
      await runCommand({
        action: async () => {
          const { session } = await createRuntime({
            options: readGlobalOptions({ program }),
          });
          const lines = session.getPackContents({
            pack,
            showVscode: options.vscode,
          });
          for (const line of lines) {
            raw({ message: line });
          }
        },
      });
    });

  program
    .command("runtimes")
    .description("Print the language runtimes of the selected packs")
    .action(async () => {
      await runCommand({
        action: async () => {
          const { session } = await createRuntime({
            options: readGlobalOptions({ program }),
          });
          raw({ message: session.getCoreRuntimes().join(" ") });
        },
      });
    });
};
