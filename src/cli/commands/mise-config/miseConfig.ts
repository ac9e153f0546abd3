/**
 * Mise Config Command
 *
 * Generates mise's config.toml from the resolved mise tools.
 */

import { success } from "@/cli/logger.js";
import {
  createRuntime,
  readGlobalOptions,
  runCommand,
  type GlobalOptions,
} from "@/cli/runtime.js";
import { normalizePath } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Generate the mise config
 * @param args - Configuration arguments
 * @param args.options - Global command line options
 * @param args.output - Destination path
 *
 * @returns The absolute path written
 */
export const generateMiseConfig = async (args: {
  options: GlobalOptions;
  output: string;
}): Promise<string> => {
  const { options, output } = args;
  const { session, miseTemplatePath } = await createRuntime({ options });

  const outputPath = normalizePath({ value: output });
  session.generateMiseConfig({ outputPath, templatePath: miseTemplatePath });
  return outputPath;
};

/**
 * Register the 'mise-config' command with commander
 * Callers writing to a shared path must not run it concurrently.
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerMiseConfigCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("mise-config")
    .description("Generate mise config.toml from the resolved mise tools")
    .argument("<output>", "Path of the config.toml to write")
    .action(async (output: string) => {
      await runCommand({
        action: async () => {
          const outputPath = await generateMiseConfig({
            options: readGlobalOptions({ program }),
            output,
          });
          success({ message: `✓ mise config written: ${outputPath}` });
        },
      });
    });
};
