/**
 * Runtime assembly for CLI commands
 *
 * Combines command line options, environment variables and config.json into
 * an execution context and a resolution session. Precedence for every
 * setting: flag, then environment, then config file, then built-in default.
 */

import {
  DEFAULT_PACKS,
  getDefaultMiseTemplatePath,
  loadConfig,
  parsePackList,
  type Config,
} from "@/cli/config.js";
import {
  getBaseManifestPath,
  getOverlayManifestPath,
  ManifestStore,
} from "@/cli/features/manifest/manifest.js";
import { ResolutionSession } from "@/cli/features/resolver/session.js";
import { error } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type {
  AppStore,
  ExecutionContext,
} from "@/cli/features/manifest/types.js";
import type { Command } from "commander";

export const ENV_SELECTED_PACKS = "PACKPLAN_SELECTED_PACKS";
export const ENV_DEFAULT_PACKS = "PACKPLAN_DEFAULT_PACKS";
export const ENV_CUSTOM_PACKAGES = "PACKPLAN_CUSTOM_PACKAGES";

const DEFAULT_PACKAGE_MANAGER = "apt";

/**
 * Global command line options
 */
export type GlobalOptions = {
  dotDir?: string | null;
  customDir?: string | null;
  packs?: string | null;
  packageManager?: string | null;
  appStore?: string | null;
  wsl?: boolean | null;
  dedupe?: boolean | null;
};

export type Runtime = {
  config: Config;
  store: ManifestStore;
  session: ResolutionSession;
  miseTemplatePath: string;
};

/**
 * Read the global options registered on the root program
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 *
 * @returns The typed global options
 */
export const readGlobalOptions = (args: { program: Command }): GlobalOptions => {
  const opts = args.program.opts();
  const asString = (value: unknown): string | null =>
    typeof value === "string" ? value : null;
  const asBoolean = (value: unknown): boolean | null =>
    typeof value === "boolean" ? value : null;

  return {
    dotDir: asString(opts.dotDir),
    customDir: asString(opts.customDir),
    packs: asString(opts.packs),
    packageManager: asString(opts.packageManager),
    appStore: asString(opts.appStore),
    wsl: asBoolean(opts.wsl),
    dedupe: asBoolean(opts.dedupe),
  };
};

const readEnv = (args: {
  env: NodeJS.ProcessEnv;
  name: string;
}): string | null => {
  const value = args.env[args.name];
  return value == null || value === "" ? null : value;
};

/**
 * Detect WSL from the variables WSL sets in every session
 * @param args - Detection arguments
 * @param args.env - Process environment
 *
 * @returns True if running under WSL
 */
export const detectWsl = (args: { env: NodeJS.ProcessEnv }): boolean => {
  const { env } = args;
  return (
    readEnv({ env, name: "WSL_DISTRO_NAME" }) != null ||
    readEnv({ env, name: "WSL_INTEROP" }) != null
  );
};

const isAppStore = (value: string): value is AppStore =>
  value === "snap" || value === "flatpak" || value === "none";

/**
 * Resolve the ordered pack selection
 * @param args - Resolution arguments
 * @param args.options - Global command line options
 * @param args.env - Process environment
 * @param args.config - Loaded config
 *
 * @returns Pack names in selection order
 */
export const resolveSelectedPacks = (args: {
  options: GlobalOptions;
  env: NodeJS.ProcessEnv;
  config: Config;
}): Array<string> => {
  const { options, env, config } = args;

  const selected =
    options.packs ?? readEnv({ env, name: ENV_SELECTED_PACKS });
  if (selected != null) {
    return parsePackList({ value: selected });
  }
  if (config.selectedPacks != null) {
    return [...config.selectedPacks];
  }

  const defaults = readEnv({ env, name: ENV_DEFAULT_PACKS });
  if (defaults != null) {
    return parsePackList({ value: defaults });
  }
  return [...(config.defaultPacks ?? DEFAULT_PACKS)];
};

/**
 * Resolve the execution context
 * @param args - Resolution arguments
 * @param args.options - Global command line options
 * @param args.env - Process environment
 * @param args.config - Loaded config
 *
 * @throws Error if the app store option names an unknown store
 *
 * @returns The execution context
 */
export const resolveExecutionContext = (args: {
  options: GlobalOptions;
  env: NodeJS.ProcessEnv;
  config: Config;
}): ExecutionContext => {
  const { options, env, config } = args;

  const isWSL = options.wsl ?? detectWsl({ env });

  let appStore: AppStore = config.appStore ?? (isWSL ? "none" : "snap");
  if (options.appStore != null) {
    if (!isAppStore(options.appStore)) {
      throw new Error(
        `Unknown app store "${options.appStore}" (expected snap, flatpak or none)`,
      );
    }
    appStore = options.appStore;
  }

  return {
    packageManager:
      options.packageManager ?? config.packageManager ?? DEFAULT_PACKAGE_MANAGER,
    appStore,
    isWSL,
  };
};

/**
 * Build the runtime for one command invocation
 * @param args - Runtime arguments
 * @param args.options - Global command line options
 * @param args.env - Process environment (defaults to process.env)
 *
 * @returns Config, manifest store and resolution session
 */
export const createRuntime = async (args: {
  options: GlobalOptions;
  env?: NodeJS.ProcessEnv | null;
}): Promise<Runtime> => {
  const { options } = args;
  const env = args.env ?? process.env;

  const dotDir = normalizePath({ value: options.dotDir });
  const config: Config = (await loadConfig({ dotDir })) ?? {
    dotDir,
    dedupe: false,
  };

  const customDir =
    options.customDir ?? readEnv({ env, name: ENV_CUSTOM_PACKAGES });
  const customPackagesDir =
    customDir != null
      ? normalizePath({ value: customDir })
      : (config.customPackagesDir ?? null);

  const store = new ManifestStore({
    manifestPath: getBaseManifestPath({ dotDir }),
    overlayPath:
      customPackagesDir == null
        ? null
        : getOverlayManifestPath({ customPackagesDir }),
  });

  const session = new ResolutionSession({
    loadManifest: () => store.load(),
    selectedPacks: resolveSelectedPacks({ options, env, config }),
    context: resolveExecutionContext({ options, env, config }),
    dedupe: options.dedupe ?? config.dedupe,
  });

  return {
    config,
    store,
    session,
    miseTemplatePath:
      config.miseTemplatePath ?? getDefaultMiseTemplatePath({ dotDir }),
  };
};

/**
 * Run a command action, reporting failures
 * Sets a failing exit code instead of exiting so pending output is flushed.
 * @param args - Run arguments
 * @param args.action - The command body
 */
export const runCommand = async (args: {
  action: () => Promise<void>;
}): Promise<void> => {
  try {
    await args.action();
  } catch (err) {
    error({ message: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  }
};
