/**
 * Overlay merge for manifest documents
 *
 * Maps merge key by key, recursively. Any other overlay value (scalar, list,
 * null) replaces the base value wholesale: lists are never merged element-wise.
 * Keys keep the base document's order; keys new in the overlay are appended in
 * overlay order.
 */

import { isDocumentMap } from "./document.js";

import type { DocumentMap, DocumentValue, ManifestDocument } from "./types.js";

/**
 * Deep-copy a document value so merge results never share nodes with inputs
 * @param value - Value to copy
 *
 * @returns A structurally equal copy
 */
const cloneValue = (value: DocumentValue): DocumentValue => {
  if (isDocumentMap(value)) {
    return cloneMap(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  return value;
};

const cloneMap = (map: DocumentMap): DocumentMap => {
  const copy: DocumentMap = new Map();
  for (const [key, value] of map) {
    copy.set(key, cloneValue(value));
  }
  return copy;
};

const mergeMaps = (base: DocumentMap, overlay: DocumentMap): DocumentMap => {
  const result = cloneMap(base);
  for (const [key, value] of overlay) {
    const current = result.get(key);
    if (isDocumentMap(current) && isDocumentMap(value)) {
      result.set(key, mergeMaps(current, value));
    } else {
      result.set(key, cloneValue(value));
    }
  }
  return result;
};

/**
 * Merge an overlay document onto a base document
 * Pure: neither input is modified.
 * @param args - Merge arguments
 * @param args.base - Base manifest
 * @param args.overlay - Organization overlay (null or undefined for none)
 *
 * @returns The merged manifest
 */
export const mergeDocuments = (args: {
  base: ManifestDocument;
  overlay?: ManifestDocument | null;
}): ManifestDocument => {
  const { base, overlay } = args;
  if (overlay == null) {
    return cloneMap(base);
  }
  return mergeMaps(base, overlay);
};
