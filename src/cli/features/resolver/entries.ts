/**
 * Readers turning raw manifest attribute maps into typed entries
 */

import {
  isDocumentMap,
  readScalar,
  readTags,
} from "@/cli/features/manifest/document.js";

import type {
  Category,
  DocumentMap,
  DocumentValue,
  EntryFor,
} from "@/cli/features/manifest/types.js";

export const DEFAULT_FLATPAK_REMOTE = "flathub";

type ReaderArgs = {
  name: string;
  scope: string;
  attributes: DocumentMap | null;
};

type EntryReaders = {
  [C in Category]: (args: ReaderArgs) => EntryFor<C>;
};

const ENTRY_READERS: EntryReaders = {
  system: ({ name, scope, attributes }) => ({
    kind: "system",
    name,
    scope,
    tags: readTags({ attributes }),
  }),
  snap: ({ name, scope, attributes }) => ({
    kind: "snap",
    name,
    scope,
    tags: readTags({ attributes }),
    options: readScalar({ attributes, key: "options" }) ?? "",
  }),
  flatpak: ({ name, scope, attributes }) => ({
    kind: "flatpak",
    name,
    scope,
    tags: readTags({ attributes }),
    remote:
      readScalar({ attributes, key: "remote" }) ?? DEFAULT_FLATPAK_REMOTE,
  }),
  mise: ({ name, scope, attributes }) => {
    const backend = readScalar({ attributes, key: "backend" });
    return {
      kind: "mise",
      name,
      scope,
      tags: readTags({ attributes }),
      version: readScalar({ attributes, key: "version" }) ?? "",
      backend,
      toolKey: backend ?? name,
    };
  },
  custom: ({ name, scope, attributes }) => ({
    kind: "custom",
    name,
    scope,
    tags: readTags({ attributes }),
    version: readScalar({ attributes, key: "version" }) ?? "",
    installer: readScalar({ attributes, key: "installer" }) ?? "",
  }),
  vscode: ({ name, scope, attributes }) => ({
    kind: "vscode",
    name,
    scope,
    tags: readTags({ attributes }),
    version: readScalar({ attributes, key: "version" }) ?? "",
  }),
};

/**
 * Read one manifest entry as the variant for its category
 * An entry whose value is not a map (e.g. `git:` with nothing after it) has
 * no attributes.
 * @param args - Reader arguments
 * @param args.category - Category the entry was selected for
 * @param args.name - Entry key
 * @param args.scope - "core" or the pack name
 * @param args.value - Raw entry value
 *
 * @returns The typed entry
 */
export const readEntry = <C extends Category>(args: {
  category: C;
  name: string;
  scope: string;
  value: DocumentValue;
}): EntryFor<C> => {
  const { category, name, scope, value } = args;
  const reader = ENTRY_READERS[category];
  return reader({
    name,
    scope,
    attributes: isDocumentMap(value) ? value : null,
  });
};
