/**
 * packplan command tree
 */

import { Command } from "commander";

import { registerCheckCommand } from "@/cli/commands/check/check.js";
import { registerMiseConfigCommand } from "@/cli/commands/mise-config/miseConfig.js";
import { registerPackagesCommand } from "@/cli/commands/packages/packages.js";
import { registerPacksCommand } from "@/cli/commands/packs/packs.js";
import { registerToolVersionCommand } from "@/cli/commands/tool-version/toolVersion.js";
import { setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

/**
 * Build the root program with global options and all commands registered
 * @returns Commander program instance
 */
export const createProgram = (): Command => {
  const program = new Command();
  const version = getCurrentPackageVersion() || "unknown";

  program
    .name("packplan")
    .version(version)
    .description(`packplan - package manifest resolver v${version}`)
    .option(
      "-d, --dot-dir <path>",
      "Dotfiles root holding .config/packplan/packages.yaml (default: current directory)",
    )
    .option(
      "--custom-dir <path>",
      "Directory holding packages-custom.yaml (env: PACKPLAN_CUSTOM_PACKAGES)",
    )
    .option(
      "-p, --packs <list>",
      "Space- or comma-separated packs to resolve (env: PACKPLAN_SELECTED_PACKS)",
    )
    .option("--package-manager <name>", "System package manager (default: apt)")
    .option("--app-store <name>", "App store: snap, flatpak or none")
    .option("--wsl", "Resolve for WSL (default: detected from environment)")
    .option("--no-wsl", "Resolve for a non-WSL host")
    .option("--dedupe", "Drop repeated system, snap and flatpak packages")
    .option("-q, --quiet", "Suppress diagnostics (errors and data still print)")
    .hook("preAction", (thisCommand) => {
      setSilentMode({ silent: thisCommand.opts().quiet === true });
    })
    .addHelpText(
      "after",
      `
Examples:
  $ packplan packages system
  $ packplan --packs "node python" packages mise
  $ packplan --wsl packages custom
  $ packplan tool-version node
  $ packplan mise-config ~/.config/mise/config.toml
  $ packplan pack-contents java --no-vscode
  $ packplan check
`,
    );

  registerPackagesCommand({ program });
  registerToolVersionCommand({ program });
  registerMiseConfigCommand({ program });
  registerPacksCommand({ program });
  registerCheckCommand({ program });

  return program;
};
