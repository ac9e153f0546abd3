/**
 * Tests for configuration management
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  getConfigPath,
  getDefaultMiseTemplatePath,
  loadConfig,
  parsePackList,
  validateConfig,
} from "./config.js";

describe("getConfigPath", () => {
  it("should place config.json beside packages.yaml", () => {
    expect(getConfigPath({ dotDir: "/home/user/dotfiles" })).toBe(
      "/home/user/dotfiles/.config/packplan/config.json",
    );
  });
});

describe("getDefaultMiseTemplatePath", () => {
  it("should point at the dotfiles mise config", () => {
    expect(getDefaultMiseTemplatePath({ dotDir: "/home/user/dotfiles" })).toBe(
      "/home/user/dotfiles/.config/mise/config.toml",
    );
  });
});

describe("parsePackList", () => {
  it("should split on spaces and commas", () => {
    expect(parsePackList({ value: "node python,go" })).toEqual([
      "node",
      "python",
      "go",
    ]);
  });

  it("should drop empty tokens", () => {
    expect(parsePackList({ value: "  java ,, ruby  " })).toEqual([
      "java",
      "ruby",
    ]);
  });

  it("should return nothing for a blank list", () => {
    expect(parsePackList({ value: "   " })).toEqual([]);
  });
});

describe("config", () => {
  let tempDir: string;
  let configPath: string;

  const writeConfig = async (content: string): Promise<void> => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, content);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    configPath = getConfigPath({ dotDir: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    it("should return null when config file does not exist", async () => {
      expect(await loadConfig({ dotDir: tempDir })).toBeNull();
    });

    it("should return null for malformed JSON", async () => {
      await writeConfig("{ not json");

      expect(await loadConfig({ dotDir: tempDir })).toBeNull();
    });

    it("should return null when a field has the wrong type", async () => {
      await writeConfig(JSON.stringify({ selectedPacks: "node" }));

      expect(await loadConfig({ dotDir: tempDir })).toBeNull();
    });

    it("should return null for an unknown app store", async () => {
      await writeConfig(JSON.stringify({ appStore: "brew" }));

      expect(await loadConfig({ dotDir: tempDir })).toBeNull();
    });

    it("should apply defaults to an empty config", async () => {
      await writeConfig("{}");

      expect(await loadConfig({ dotDir: tempDir })).toEqual({
        dotDir: tempDir,
        customPackagesDir: null,
        selectedPacks: null,
        defaultPacks: null,
        packageManager: null,
        appStore: null,
        dedupe: false,
        miseTemplatePath: null,
      });
    });

    it("should load every setting", async () => {
      await writeConfig(
        JSON.stringify({
          customPackagesDir: "/srv/custom",
          selectedPacks: ["node", "go"],
          defaultPacks: ["java"],
          packageManager: "dnf",
          appStore: "flatpak",
          dedupe: true,
          miseTemplatePath: "/srv/mise.toml",
        }),
      );

      expect(await loadConfig({ dotDir: tempDir })).toEqual({
        dotDir: tempDir,
        customPackagesDir: "/srv/custom",
        selectedPacks: ["node", "go"],
        defaultPacks: ["java"],
        packageManager: "dnf",
        appStore: "flatpak",
        dedupe: true,
        miseTemplatePath: "/srv/mise.toml",
      });
    });

    it("should resolve relative paths against the dotfiles root", async () => {
      await writeConfig(
        JSON.stringify({
          customPackagesDir: "custom/",
          miseTemplatePath: "./templates/mise.toml",
        }),
      );

      const loaded = await loadConfig({ dotDir: tempDir });

      expect(loaded?.customPackagesDir).toBe(path.join(tempDir, "custom"));
      expect(loaded?.miseTemplatePath).toBe(
        path.join(tempDir, "templates", "mise.toml"),
      );
    });

    it("should ignore unknown properties", async () => {
      await writeConfig(JSON.stringify({ packageManager: "apt", theme: "dark" }));

      const loaded = await loadConfig({ dotDir: tempDir });

      expect(loaded?.packageManager).toBe("apt");
    });
  });

  describe("validateConfig", () => {
    it("should accept a missing config file", async () => {
      expect(await validateConfig({ dotDir: tempDir })).toEqual({
        valid: true,
        message: "No config.json found, using defaults",
        errors: null,
      });
    });

    it("should accept a valid config", async () => {
      await writeConfig(JSON.stringify({ selectedPacks: ["node"] }));

      expect(await validateConfig({ dotDir: tempDir })).toEqual({
        valid: true,
        message: "Config is valid",
        errors: null,
      });
    });

    it("should reject invalid JSON", async () => {
      await writeConfig("{ not json");

      const result = await validateConfig({ dotDir: tempDir });

      expect(result.valid).toBe(false);
      expect(result.message).toBe("Invalid JSON in config.json");
      expect(result.errors).toHaveLength(1);
    });

    it("should report unknown properties", async () => {
      await writeConfig(JSON.stringify({ theme: "dark" }));

      expect(await validateConfig({ dotDir: tempDir })).toEqual({
        valid: false,
        message: "Config has validation errors",
        errors: ["Config validation error at /theme: unknown property"],
      });
    });

    it("should report schema violations with their location", async () => {
      await writeConfig(JSON.stringify({ appStore: "brew" }));

      const result = await validateConfig({ dotDir: tempDir });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "Config validation error at /appStore: must be equal to one of the allowed values",
      ]);
    });

    it("should reject a non-object root", async () => {
      await writeConfig("[]");

      const result = await validateConfig({ dotDir: tempDir });

      expect(result.errors).toEqual([
        "Config validation error at (root): must be object",
      ]);
    });
  });
});
