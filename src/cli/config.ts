/**
 * Configuration management for packplan
 * Loads the optional config.json that sits next to packages.yaml
 */

import * as fs from "fs/promises";
import * as path from "path";

import { Ajv } from "ajv";

import { normalizePath } from "@/utils/path.js";

import type { AppStore } from "@/cli/features/manifest/types.js";

/**
 * Packs selected when neither the command line, the environment nor the
 * config file names any
 */
export const DEFAULT_PACKS: ReadonlyArray<string> = [
  "java",
  "node",
  "python",
  "go",
  "ruby",
];

/**
 * Runtime configuration loaded from disk
 * Paths are absolute; relative paths in the file are resolved against dotDir.
 */
export type Config = {
  dotDir: string;
  /** Directory holding packages-custom.yaml */
  customPackagesDir?: string | null;
  /** Packs to resolve, in order */
  selectedPacks?: Array<string> | null;
  /** Fallback selection when selectedPacks is unset */
  defaultPacks?: Array<string> | null;
  packageManager?: string | null;
  appStore?: AppStore | null;
  /** Drop repeated system/snap/flatpak names */
  dedupe: boolean;
  /** Template whose pre-[tools] part starts the generated mise config */
  miseTemplatePath?: string | null;
};

/**
 * Raw disk config type - the JSON structure on disk after schema validation
 */
type RawDiskConfig = {
  customPackagesDir?: string;
  selectedPacks?: Array<string>;
  defaultPacks?: Array<string>;
  packageManager?: string;
  appStore?: AppStore;
  dedupe: boolean;
  miseTemplatePath?: string;
};

/**
 * Get the path to the config file
 * @param args - Configuration arguments
 * @param args.dotDir - Root of the dotfiles tree
 *
 * @returns The absolute path to .config/packplan/config.json
 */
export const getConfigPath = (args: { dotDir: string }): string => {
  const { dotDir } = args;
  return path.join(dotDir, ".config", "packplan", "config.json");
};

/**
 * Get the default mise template path
 * @param args - Configuration arguments
 * @param args.dotDir - Root of the dotfiles tree
 *
 * @returns The absolute path to .config/mise/config.toml
 */
export const getDefaultMiseTemplatePath = (args: { dotDir: string }): string => {
  const { dotDir } = args;
  return path.join(dotDir, ".config", "mise", "config.toml");
};

/**
 * Split a pack list as written in environment variables or flags
 * @param args - Parse arguments
 * @param args.value - Space- or comma-separated pack names
 *
 * @returns Pack names in order, empty tokens dropped
 */
export const parsePackList = (args: { value: string }): Array<string> => {
  return args.value.split(/[\s,]+/).filter((pack) => pack !== "");
};

// JSON schema for config.json - single source of truth for validation
const configSchema = {
  type: "object",
  properties: {
    customPackagesDir: { type: "string" },
    selectedPacks: { type: "array", items: { type: "string" } },
    defaultPacks: { type: "array", items: { type: "string" } },
    packageManager: { type: "string", minLength: 1 },
    appStore: { type: "string", enum: ["snap", "flatpak", "none"] },
    dedupe: { type: "boolean", default: false },
    miseTemplatePath: { type: "string" },
  },
  additionalProperties: false,
};

// Configured Ajv instance for schema validation
const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
});

// Compiled validator for config schema
const validateConfigSchema = ajv.compile<RawDiskConfig>(configSchema);

/**
 * Load existing configuration from disk
 * Uses JSON schema validation for strict type checking.
 * @param args - Configuration arguments
 * @param args.dotDir - Root of the dotfiles tree
 *
 * @returns The config if present and valid, null otherwise
 */
export const loadConfig = async (args: {
  dotDir: string;
}): Promise<Config | null> => {
  const { dotDir } = args;
  const configPath = getConfigPath({ dotDir });

  let rawConfig: unknown;
  try {
    const content = await fs.readFile(configPath, "utf-8");
    rawConfig = JSON.parse(content);
  } catch {
    // File doesn't exist or is invalid JSON
    return null;
  }

  // Validate with schema - this applies defaults and removes unknown properties
  if (!validateConfigSchema(rawConfig)) {
    return null;
  }

  const resolveOptionalPath = (value?: string): string | null =>
    value == null ? null : normalizePath({ value, baseDir: dotDir });

  return {
    dotDir,
    customPackagesDir: resolveOptionalPath(rawConfig.customPackagesDir),
    selectedPacks: rawConfig.selectedPacks ?? null,
    defaultPacks: rawConfig.defaultPacks ?? null,
    packageManager: rawConfig.packageManager ?? null,
    appStore: rawConfig.appStore ?? null,
    dedupe: rawConfig.dedupe,
    miseTemplatePath: resolveOptionalPath(rawConfig.miseTemplatePath),
  };
};

/**
 * Validation result type
 */
export type ConfigValidationResult = {
  valid: boolean;
  message: string;
  errors?: Array<string> | null;
};

/**
 * Validate configuration file
 * A missing file is valid: every setting has a default.
 * @param args - Configuration arguments
 * @param args.dotDir - Root of the dotfiles tree
 *
 * @returns Validation result with details
 */
export const validateConfig = async (args: {
  dotDir: string;
}): Promise<ConfigValidationResult> => {
  const { dotDir } = args;
  const configPath = getConfigPath({ dotDir });

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {
        valid: true,
        message: "No config.json found, using defaults",
        errors: null,
      };
    }
    return {
      valid: false,
      message: "Unable to read config.json",
      errors: [`Failed to read config file: ${err}`],
    };
  }

  let config: unknown;
  try {
    config = JSON.parse(content);
  } catch (err) {
    return {
      valid: false,
      message: "Invalid JSON in config.json",
      errors: [`Config file contains invalid JSON: ${err}`],
    };
  }

  // Unknown keys would be removed silently by the shared validator, so flag them first
  const errors: Array<string> = [];
  if (config != null && typeof config === "object" && !Array.isArray(config)) {
    const known = Object.keys(configSchema.properties);
    for (const key of Object.keys(config)) {
      if (!known.includes(key)) {
        errors.push(`Config validation error at /${key}: unknown property`);
      }
    }
  }

  if (!validateConfigSchema(config) && validateConfigSchema.errors) {
    for (const error of validateConfigSchema.errors) {
      const location = error.instancePath || "(root)";
      const message = error.message || "unknown error";
      errors.push(`Config validation error at ${location}: ${message}`);
    }
  }

  if (errors.length > 0) {
    return {
      valid: false,
      message: "Config has validation errors",
      errors,
    };
  }

  return {
    valid: true,
    message: "Config is valid",
    errors: null,
  };
};
