/**
 * Tests for overlay merging
 */

import { describe, it, expect } from "vitest";

import { getMapAt, parseManifestText } from "./document.js";
import { mergeDocuments } from "./merge.js";

const doc = (text: string) => parseManifestText({ text });

describe("mergeDocuments", () => {
  const base = doc(`
core:
  common:
    git: {}
    curl:
      tags: ["@skip-wsl"]
  mise:
    node:
      version: "20"
packs:
  java:
    description: Java development
`);

  it("should return a structurally equal copy when there is no overlay", () => {
    const merged = mergeDocuments({ base });

    expect(merged).toEqual(base);
    expect(merged).not.toBe(base);
  });

  it("should treat a null overlay like no overlay", () => {
    expect(mergeDocuments({ base, overlay: null })).toEqual(base);
  });

  it("should merge nested maps key by key", () => {
    const overlay = doc(`
core:
  mise:
    node:
      backend: "core:node"
    go:
      version: "1.22"
`);

    const merged = mergeDocuments({ base, overlay });

    expect(merged).toEqual(
      doc(`
core:
  common:
    git: {}
    curl:
      tags: ["@skip-wsl"]
  mise:
    node:
      version: "20"
      backend: "core:node"
    go:
      version: "1.22"
packs:
  java:
    description: Java development
`),
    );
  });

  it("should replace lists wholesale instead of merging elements", () => {
    const overlay = doc(`
core:
  common:
    curl:
      tags: ["@custom"]
`);

    const merged = mergeDocuments({ base, overlay });
    const curl = getMapAt({ node: merged, path: ["core", "common", "curl"] });

    expect(curl?.get("tags")).toEqual(["@custom"]);
  });

  it("should replace scalars and let a scalar replace a map", () => {
    const overlay = doc(`
core:
  mise: disabled
packs:
  java:
    description: Java (organization build)
`);

    const merged = mergeDocuments({ base, overlay });

    expect(merged.get("core")).toEqual(
      doc(`
common:
  git: {}
  curl:
    tags: ["@skip-wsl"]
mise: disabled
`),
    );
    expect(merged.get("packs")).toEqual(
      doc(`
java:
  description: Java (organization build)
`),
    );
  });

  it("should keep base key order and append new overlay keys", () => {
    const overlay = doc(`
packs:
  rust:
    description: Rust
  java:
    description: Java 21
`);

    const merged = mergeDocuments({ base, overlay });
    const packs = merged.get("packs");

    expect(packs instanceof Map ? [...packs.keys()] : null).toEqual([
      "java",
      "rust",
    ]);
  });

  it("should be idempotent when the same overlay is applied twice", () => {
    const overlay = doc(`
core:
  common:
    jq: {}
  mise:
    node:
      version: "22"
`);

    const once = mergeDocuments({ base, overlay });
    const twice = mergeDocuments({ base: once, overlay });

    expect(twice).toEqual(once);
  });

  it("should not modify its inputs", () => {
    const overlay = doc(`
core:
  mise:
    node:
      version: "22"
`);
    const baseBefore = mergeDocuments({ base });
    const overlayBefore = mergeDocuments({ base: overlay });

    mergeDocuments({ base, overlay });

    expect(base).toEqual(baseBefore);
    expect(overlay).toEqual(overlayBefore);
  });
});
