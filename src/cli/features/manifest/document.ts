/**
 * Parsing and best-effort lookups over manifest documents
 */

import { parseDocument } from "yaml";

import { warn } from "@/cli/logger.js";

import type { DocumentMap, DocumentValue, ManifestDocument } from "./types.js";

/**
 * Convert a value produced by the YAML parser into a DocumentValue
 * @param value - Parsed value (maps arrive as Map instances)
 *
 * @returns The typed document value
 */
const toDocumentValue = (value: unknown): DocumentValue => {
  if (value == null) {
    return null;
  }
  if (value instanceof Map) {
    const map: DocumentMap = new Map();
    for (const [key, child] of value) {
      map.set(String(key), toDocumentValue(child));
    }
    return map;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toDocumentValue(item));
  }
  return String(value);
};

/**
 * Parse manifest YAML text
 *
 * Uses the failsafe schema so scalars keep their source text ("1.20" stays
 * "1.20" rather than becoming the number 1.2), and Maps so that entry order
 * follows the document. `<<` merge keys are expanded. Parser warnings go
 * through the logger.
 *
 * @param args - Parse arguments
 * @param args.text - YAML source
 *
 * @throws YAMLError if the text is not valid YAML
 *
 * @returns The parsed value; null for an empty document
 */
export const parseDocumentText = (args: { text: string }): DocumentValue => {
  const document = parseDocument(args.text, {
    schema: "failsafe",
    merge: true,
    prettyErrors: true,
  });

  const [firstError] = document.errors;
  if (firstError != null) {
    throw firstError;
  }
  for (const warning of document.warnings) {
    warn({ message: warning.message });
  }

  const parsed: unknown = document.toJS({ mapAsMap: true });
  return toDocumentValue(parsed);
};

/**
 * Parse manifest YAML text that must hold a mapping at its root
 * An empty document yields an empty manifest.
 * @param args - Parse arguments
 * @param args.text - YAML source
 *
 * @throws Error if the text is not valid YAML or its root is not a mapping
 *
 * @returns The manifest document
 */
export const parseManifestText = (args: { text: string }): ManifestDocument => {
  const value = parseDocumentText(args);
  if (value == null) {
    return new Map();
  }
  if (!isDocumentMap(value)) {
    throw new Error("document root is not a mapping");
  }
  return value;
};

export const isDocumentMap = (
  value: DocumentValue | undefined,
): value is DocumentMap => value instanceof Map;

/**
 * Walk a path of keys through nested maps
 * @param args - Lookup arguments
 * @param args.node - Starting node
 * @param args.path - Keys to follow
 *
 * @returns The map at the end of the path, or null if any step is missing or not a map
 */
export const getMapAt = (args: {
  node: DocumentValue | undefined;
  path: ReadonlyArray<string>;
}): DocumentMap | null => {
  let current: DocumentValue | undefined = args.node;
  for (const key of args.path) {
    if (!isDocumentMap(current)) {
      return null;
    }
    current = current.get(key);
  }
  return isDocumentMap(current) ? current : null;
};

/**
 * Read a scalar attribute
 * Empty, `null` and `~` values count as absent.
 * @param args - Lookup arguments
 * @param args.attributes - Attribute map of an entry (null when the entry has none)
 * @param args.key - Attribute name
 *
 * @returns The attribute text, or null if absent or not a scalar
 */
export const readScalar = (args: {
  attributes: DocumentMap | null;
  key: string;
}): string | null => {
  const value = args.attributes?.get(args.key);
  if (typeof value !== "string") {
    return null;
  }
  if (value === "" || value === "null" || value === "~") {
    return null;
  }
  return value;
};

/**
 * Read an entry's tags
 * A single string is treated as a one-element list; anything else yields no tags.
 * @param args - Lookup arguments
 * @param args.attributes - Attribute map of an entry
 *
 * @returns Tag strings in document order
 */
export const readTags = (args: {
  attributes: DocumentMap | null;
}): Array<string> => {
  const value = args.attributes?.get("tags");
  if (typeof value === "string") {
    return value === "" ? [] : [value];
  }
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === "string");
  }
  return [];
};
