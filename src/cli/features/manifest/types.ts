/**
 * Types for the packages manifest
 *
 * The manifest (packages.yaml) declares every installable tool, split into a
 * `core` group that is always resolved and optional `packs` the user selects.
 * Parsed documents keep the key order of the YAML source by using Maps.
 */

/**
 * Any value found in a parsed manifest document
 * Scalars are kept as the literal text of the source document.
 */
export type DocumentValue = string | null | Array<DocumentValue> | DocumentMap;

/**
 * An ordered mapping node
 */
export type DocumentMap = Map<string, DocumentValue>;

/**
 * A whole manifest document (base, overlay, or the merged result)
 */
export type ManifestDocument = DocumentMap;

/**
 * Tool categories that can be resolved
 * `system` is the union of the manager-agnostic `common` map and the map
 * named after the active package manager.
 */
export type Category =
  | "system"
  | "snap"
  | "flatpak"
  | "mise"
  | "custom"
  | "vscode";

export const CATEGORIES: ReadonlyArray<Category> = [
  "system",
  "snap",
  "flatpak",
  "mise",
  "custom",
  "vscode",
];

/**
 * App store available on the host
 */
export type AppStore = "snap" | "flatpak" | "none";

/**
 * Runtime facts supplied by distro and WSL detection
 */
export type ExecutionContext = {
  /** Name of the system package manager map to read (e.g. "apt", "dnf") */
  packageManager: string;
  appStore: AppStore;
  isWSL: boolean;
};

/**
 * Fields shared by every resolved entry
 */
type EntryBase = {
  name: string;
  tags: ReadonlyArray<string>;
  /** "core" or the name of the pack the entry came from */
  scope: string;
};

export type SystemEntry = EntryBase & { kind: "system" };

export type SnapEntry = EntryBase & {
  kind: "snap";
  /** Extra `snap install` flags, e.g. "--classic" */
  options: string;
};

export type FlatpakEntry = EntryBase & {
  kind: "flatpak";
  remote: string;
};

export type MiseEntry = EntryBase & {
  kind: "mise";
  version: string;
  /** Registry key override, e.g. "aqua:mikefarah/yq" */
  backend: string | null;
  /** Key written to the mise config: backend if set, else name */
  toolKey: string;
};

export type CustomEntry = EntryBase & {
  kind: "custom";
  version: string;
  installer: string;
};

export type VscodeEntry = EntryBase & {
  kind: "vscode";
  version: string;
};

export type Entry =
  | SystemEntry
  | SnapEntry
  | FlatpakEntry
  | MiseEntry
  | CustomEntry
  | VscodeEntry;

type EntryByCategory = {
  system: SystemEntry;
  snap: SnapEntry;
  flatpak: FlatpakEntry;
  mise: MiseEntry;
  custom: CustomEntry;
  vscode: VscodeEntry;
};

/**
 * Maps each category to the entry variant it resolves to
 */
export type EntryFor<C extends Category> = EntryByCategory[C];

/**
 * A pack as listed for selection
 */
export type PackSummary = {
  name: string;
  description: string;
};
