/**
 * Manifest store
 * Locates, reads and merges packages.yaml with an optional organization overlay
 */

import { existsSync, readFileSync } from "fs";
import * as path from "path";

import { warn } from "@/cli/logger.js";

import type { ManifestDocument } from "./types.js";

import { parseManifestText } from "./document.js";
import {
  ConfigurationMalformedError,
  ConfigurationMissingError,
} from "./errors.js";
import { mergeDocuments } from "./merge.js";

export const BASE_MANIFEST_FILE = "packages.yaml";
export const OVERLAY_MANIFEST_FILE = "packages-custom.yaml";

/**
 * Get the path to the base manifest
 * @param args - Configuration arguments
 * @param args.dotDir - Root of the dotfiles tree
 *
 * @returns The absolute path to .config/packplan/packages.yaml
 */
export const getBaseManifestPath = (args: { dotDir: string }): string => {
  const { dotDir } = args;
  return path.join(dotDir, ".config", "packplan", BASE_MANIFEST_FILE);
};

/**
 * Get the path to the organization overlay
 * @param args - Configuration arguments
 * @param args.customPackagesDir - Directory holding organization customizations
 *
 * @returns The absolute path to packages-custom.yaml
 */
export const getOverlayManifestPath = (args: {
  customPackagesDir: string;
}): string => {
  const { customPackagesDir } = args;
  return path.join(customPackagesDir, OVERLAY_MANIFEST_FILE);
};

/**
 * Read the base manifest
 * @param args - Read arguments
 * @param args.manifestPath - Path to packages.yaml
 *
 * @throws ConfigurationMissingError if the file does not exist
 * @throws ConfigurationMalformedError if the file cannot be read or parsed
 *
 * @returns The parsed manifest
 */
export const readBaseManifest = (args: {
  manifestPath: string;
}): ManifestDocument => {
  const { manifestPath } = args;

  if (!existsSync(manifestPath)) {
    throw new ConfigurationMissingError({ path: manifestPath });
  }

  try {
    return parseManifestText({ text: readFileSync(manifestPath, "utf-8") });
  } catch (err) {
    throw new ConfigurationMalformedError({
      path: manifestPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
};

/**
 * Read the organization overlay
 * A missing overlay is skipped; a malformed one is skipped with a warning.
 * @param args - Read arguments
 * @param args.overlayPath - Path to packages-custom.yaml
 *
 * @returns The parsed overlay, or null if it should be skipped
 */
export const readOverlayManifest = (args: {
  overlayPath: string;
}): ManifestDocument | null => {
  const { overlayPath } = args;

  if (!existsSync(overlayPath)) {
    return null;
  }

  try {
    return parseManifestText({ text: readFileSync(overlayPath, "utf-8") });
  } catch (err) {
    const malformed = new ConfigurationMalformedError({
      path: overlayPath,
      reason: err instanceof Error ? err.message : String(err),
    });
    warn({ message: `${malformed.message} (using base packages only)` });
    return null;
  }
};

/**
 * Loads the merged manifest once and keeps it until invalidated
 */
export class ManifestStore {
  readonly manifestPath: string;
  readonly overlayPath: string | null;
  private cached: ManifestDocument | null = null;

  constructor(args: { manifestPath: string; overlayPath?: string | null }) {
    this.manifestPath = args.manifestPath;
    this.overlayPath = args.overlayPath ?? null;
  }

  /**
   * Get the merged manifest, reading it on first use
   *
   * @throws ConfigurationMissingError if the base manifest does not exist
   * @throws ConfigurationMalformedError if the base manifest cannot be parsed
   *
   * @returns A copy of the merged manifest
   */
  load(): ManifestDocument {
    if (this.cached == null) {
      const base = readBaseManifest({ manifestPath: this.manifestPath });
      const overlay =
        this.overlayPath == null
          ? null
          : readOverlayManifest({ overlayPath: this.overlayPath });

      this.cached = mergeDocuments({ base, overlay });
    }

    // Callers get their own copy; the cached document is never handed out
    return mergeDocuments({ base: this.cached });
  }

  /**
   * Drop the cached document so the next load re-reads both files
   */
  invalidate(): void {
    this.cached = null;
  }
}
