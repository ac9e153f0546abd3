/**
 * Resolution session
 *
 * Owns one merged manifest together with the pack selection and execution
 * context it is resolved against. The manifest is loaded on the first
 * request and kept for the life of the session; construct a new session to
 * pick up a changed environment.
 */

import {
  getMapAt,
  isDocumentMap,
  readScalar,
} from "@/cli/features/manifest/document.js";
import { CATEGORIES } from "@/cli/features/manifest/types.js";
import { toLines } from "@/cli/features/projection/lines.js";
import { writeMiseConfig } from "@/cli/features/projection/miseConfig.js";

import type {
  Category,
  Entry,
  EntryFor,
  ExecutionContext,
  FlatpakEntry,
  ManifestDocument,
  PackSummary,
  SnapEntry,
} from "@/cli/features/manifest/types.js";

import { readEntry } from "./entries.js";
import { COMMON_KEY, CORE_SCOPE, selectScopes } from "./scopes.js";
import { shouldSkip } from "./tags.js";

/**
 * Categories whose output may be de-duplicated by name
 */
export const DEDUPE_CATEGORIES: ReadonlySet<Category> = new Set([
  "system",
  "snap",
  "flatpak",
]);

/**
 * Runtimes installed for each language pack
 */
const PACK_RUNTIMES: ReadonlyMap<string, ReadonlyArray<string>> = new Map([
  ["java", ["java", "maven", "gradle"]],
  ["node", ["node"]],
  ["python", ["python"]],
  ["go", ["go"]],
  ["ruby", ["ruby"]],
  ["rust", ["rust"]],
]);

export const isCategory = (value: string): value is Category =>
  CATEGORIES.some((category) => category === value);

export type ResolutionSessionOptions = {
  /** Supplies the merged manifest; called at most once per session */
  loadManifest: () => ManifestDocument;
  selectedPacks: ReadonlyArray<string>;
  context: ExecutionContext;
  /** Keep only the first system/snap/flatpak entry of each name (default false) */
  dedupe?: boolean | null;
};

export class ResolutionSession {
  readonly selectedPacks: ReadonlyArray<string>;
  readonly context: ExecutionContext;
  readonly dedupe: boolean;
  private readonly loadManifest: () => ManifestDocument;
  private document: ManifestDocument | null = null;

  constructor(options: ResolutionSessionOptions) {
    this.loadManifest = options.loadManifest;
    this.selectedPacks = [...options.selectedPacks];
    this.context = { ...options.context };
    this.dedupe = options.dedupe ?? false;
  }

  /**
   * The merged manifest, loaded on first use
   */
  private get manifest(): ManifestDocument {
    if (this.document == null) {
      this.document = this.loadManifest();
    }
    return this.document;
  }

  /**
   * Resolve every applicable entry of a category
   * Core entries come first, then each selected pack's in selection order.
   * @param category - Category to resolve
   *
   * @returns Entries that survive tag filtering
   */
  resolve<C extends Category>(category: C): Array<EntryFor<C>> {
    const scopes = selectScopes({
      document: this.manifest,
      category,
      selectedPacks: this.selectedPacks,
      packageManager: this.context.packageManager,
    });

    const entries: Array<EntryFor<C>> = [];
    for (const { scope, entries: map } of scopes) {
      for (const [name, value] of map) {
        const entry = readEntry({ category, name, scope, value });
        if (!shouldSkip({ tags: entry.tags, context: this.context })) {
          entries.push(entry);
        }
      }
    }

    if (this.dedupe && DEDUPE_CATEGORIES.has(category)) {
      const seen = new Set<string>();
      return entries.filter((entry) => {
        if (seen.has(entry.name)) {
          return false;
        }
        seen.add(entry.name);
        return true;
      });
    }

    return entries;
  }

  /**
   * Resolve a category given by name
   * @param category - Category name
   *
   * @returns The resolved entries; empty for an unsupported category
   */
  resolveByName(category: string): Array<Entry> {
    if (!isCategory(category)) {
      return [];
    }
    return this.resolve(category);
  }

  /**
   * Resolve a category to installer lines
   * @param category - Category name
   *
   * @returns Pipe-delimited lines; empty for an unsupported category
   */
  resolveLines(category: string): Array<string> {
    return toLines({ entries: this.resolveByName(category) });
  }

  /**
   * Resolve the packages for the host's app store
   * @returns Snap or flatpak entries, or nothing when there is no app store
   */
  getAppStorePackages(): Array<SnapEntry | FlatpakEntry> {
    switch (this.context.appStore) {
      case "snap":
        return this.resolve("snap");
      case "flatpak":
        return this.resolve("flatpak");
      case "none":
        return [];
    }
  }

  /**
   * Look up the pinned version of a tool
   * Searches core.custom, core.mise, then custom and mise of each selected
   * pack in order. Core always outranks packs.
   * @param name - Tool name as keyed in the manifest
   *
   * @returns The first non-empty version, or "" if none is pinned
   */
  getToolVersion(name: string): string {
    const paths: Array<ReadonlyArray<string>> = [
      [CORE_SCOPE, "custom"],
      [CORE_SCOPE, "mise"],
    ];
    for (const pack of this.selectedPacks) {
      paths.push(["packs", pack, "custom"], ["packs", pack, "mise"]);
    }

    for (const path of paths) {
      const entries = getMapAt({ node: this.manifest, path });
      const value = entries?.get(name);
      const version = readScalar({
        attributes: isDocumentMap(value) ? value : null,
        key: "version",
      });
      if (version != null) {
        return version;
      }
    }

    return "";
  }

  /**
   * Write a mise config.toml for the resolved mise tools
   * @param args - Generation arguments
   * @param args.outputPath - Destination file
   * @param args.templatePath - Template whose pre-[tools] part is copied (null for the built-in preamble)
   *
   * @returns The written content
   */
  generateMiseConfig(args: {
    outputPath: string;
    templatePath?: string | null;
  }): string {
    return writeMiseConfig({
      outputPath: args.outputPath,
      templatePath: args.templatePath,
      entries: this.resolve("mise"),
    });
  }

  /**
   * Describe a pack for selection menus
   * Lists mise tools, custom installers and optionally VS Code extensions,
   * then a count of the pack's system packages. Tags are not applied.
   * @param args - Listing arguments
   * @param args.pack - Pack name
   * @param args.showVscode - Whether to list VS Code extensions
   *
   * @returns Human-readable lines
   */
  getPackContents(args: { pack: string; showVscode: boolean }): Array<string> {
    const { pack, showVscode } = args;
    const keysOf = (key: string): Array<string> => [
      ...(getMapAt({ node: this.manifest, path: ["packs", pack, key] })?.keys() ??
        []),
    ];

    const lines = [...keysOf("mise"), ...keysOf("custom")];
    if (showVscode) {
      lines.push(...keysOf("vscode").map((ext) => `${ext} (VS Code)`));
    }

    const systemCount =
      keysOf(COMMON_KEY).length + keysOf(this.context.packageManager).length;
    if (systemCount > 0) {
      lines.push(`+${systemCount} system packages`);
    }

    return lines;
  }

  /**
   * List the packs defined in the manifest
   * @returns Pack names and descriptions in document order
   */
  getAvailablePacks(): Array<PackSummary> {
    const packs = getMapAt({ node: this.manifest, path: ["packs"] });
    if (packs == null) {
      return [];
    }

    return [...packs].map(([name, value]) => ({
      name,
      description:
        readScalar({
          attributes: isDocumentMap(value) ? value : null,
          key: "description",
        }) ?? "",
    }));
  }

  /**
   * List the language runtimes implied by the selected packs
   * @returns Runtime names in selection order; unknown packs add nothing
   */
  getCoreRuntimes(): Array<string> {
    return this.selectedPacks.flatMap((pack) => [
      ...(PACK_RUNTIMES.get(pack) ?? []),
    ]);
  }
}
