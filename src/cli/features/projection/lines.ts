/**
 * Line serialization of resolved entries
 *
 * Installers read one pipe-delimited record per line:
 *   system   name
 *   snap     name|options
 *   flatpak  name|remote
 *   mise     toolKey|version
 *   custom   name|version|installer|tags
 *   vscode   extensionId|version|tags
 */

import type { Entry, PackSummary } from "@/cli/features/manifest/types.js";

const formatTags = (tags: ReadonlyArray<string>): string => tags.join(",");

/**
 * Serialize one entry as an installer line
 * @param args - Serialization arguments
 * @param args.entry - Resolved entry
 *
 * @returns The pipe-delimited line
 */
export const toLine = (args: { entry: Entry }): string => {
  const { entry } = args;
  switch (entry.kind) {
    case "system":
      return entry.name;
    case "snap":
      return `${entry.name}|${entry.options}`;
    case "flatpak":
      return `${entry.name}|${entry.remote}`;
    case "mise":
      return `${entry.toolKey}|${entry.version}`;
    case "custom":
      return `${entry.name}|${entry.version}|${entry.installer}|${formatTags(entry.tags)}`;
    case "vscode":
      return `${entry.name}|${entry.version}|${formatTags(entry.tags)}`;
  }
};

/**
 * Serialize entries as installer lines
 * @param args - Serialization arguments
 * @param args.entries - Resolved entries
 *
 * @returns One line per entry
 */
export const toLines = (args: {
  entries: ReadonlyArray<Entry>;
}): Array<string> => args.entries.map((entry) => toLine({ entry }));

/**
 * Serialize pack summaries as `name|description` lines
 * @param args - Serialization arguments
 * @param args.packs - Pack summaries
 *
 * @returns One line per pack
 */
export const toPackLines = (args: {
  packs: ReadonlyArray<PackSummary>;
}): Array<string> =>
  args.packs.map((pack) => `${pack.name}|${pack.description}`);
