/**
 * Scope selection
 *
 * A resolution unions entries from `core` and then from each selected pack,
 * in selection order. System packages read two maps per scope: the
 * manager-agnostic `common` map and the map named after the package manager.
 */

import { getMapAt } from "@/cli/features/manifest/document.js";

import type {
  Category,
  DocumentMap,
  ManifestDocument,
} from "@/cli/features/manifest/types.js";

export const CORE_SCOPE = "core";
export const COMMON_KEY = "common";

/**
 * One manifest sub-tree contributing entries to a resolution
 */
export type ScopeSource = {
  /** "core" or the pack name */
  scope: string;
  /** Key path from the document root, e.g. ["packs", "java", "common"] */
  path: ReadonlyArray<string>;
};

/**
 * A scope source whose map exists in the document
 */
export type SelectedScope = ScopeSource & { entries: DocumentMap };

/**
 * List the sub-trees to read for a category, in resolution order
 * @param args - Selection arguments
 * @param args.category - Category to resolve
 * @param args.selectedPacks - Pack names in selection order
 * @param args.packageManager - Active system package manager
 *
 * @returns Scope sources, core first
 */
export const listScopeSources = (args: {
  category: Category;
  selectedPacks: ReadonlyArray<string>;
  packageManager: string;
}): Array<ScopeSource> => {
  const { category, selectedPacks, packageManager } = args;

  const keys =
    category === "system" ? [COMMON_KEY, packageManager] : [category];

  const sources: Array<ScopeSource> = keys.map((key) => ({
    scope: CORE_SCOPE,
    path: [CORE_SCOPE, key],
  }));

  for (const pack of selectedPacks) {
    for (const key of keys) {
      sources.push({ scope: pack, path: ["packs", pack, key] });
    }
  }

  return sources;
};

/**
 * Select the maps to union for a category
 * Sources whose path is missing, or does not lead to a map, contribute nothing.
 * @param args - Selection arguments
 * @param args.document - Merged manifest
 * @param args.category - Category to resolve
 * @param args.selectedPacks - Pack names in selection order
 * @param args.packageManager - Active system package manager
 *
 * @returns The existing scope maps, core first
 */
export const selectScopes = (args: {
  document: ManifestDocument;
  category: Category;
  selectedPacks: ReadonlyArray<string>;
  packageManager: string;
}): Array<SelectedScope> => {
  const { document } = args;
  const selected: Array<SelectedScope> = [];

  for (const source of listScopeSources(args)) {
    const entries = getMapAt({ node: document, path: source.path });
    if (entries != null) {
      selected.push({ ...source, entries });
    }
  }

  return selected;
};
