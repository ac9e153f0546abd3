/**
 * Tests for the pack commands
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  vi,
  type MockInstance,
} from "vitest";

import { createProgram } from "@/cli/program.js";

const MANIFEST = `
packs:
  java:
    description: Java development
    common:
      ant: {}
    apt:
      default-jdk: {}
      maven: {}
    mise:
      java:
        version: "21"
    custom:
      intellij:
        version: "2024.3"
    vscode:
      redhat.java: {}
  rust:
    description: Rust toolchain
`;

describe("pack commands", () => {
  let tempDir: string;
  let consoleLog: MockInstance<typeof console.log>;

  const run = async (args: Array<string>): Promise<Array<string>> => {
    await createProgram()
      .exitOverride()
      .parseAsync(["node", "packplan", "--dot-dir", tempDir, ...args]);
    return consoleLog.mock.calls.map((call) => String(call[0]));
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "packs-test-"));
    const manifestDir = path.join(tempDir, ".config", "packplan");
    await fs.mkdir(manifestDir, { recursive: true });
    await fs.writeFile(path.join(manifestDir, "packages.yaml"), MANIFEST);

    vi.stubEnv("PACKPLAN_SELECTED_PACKS", "");
    vi.stubEnv("PACKPLAN_DEFAULT_PACKS", "");
    vi.stubEnv("PACKPLAN_CUSTOM_PACKAGES", "");
    consoleLog = vi.spyOn(console, "log").mockImplementation(() => {
      // capture
    });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should list packs as name|description", async () => {
    expect(await run(["packs"])).toEqual([
      "java|Java development",
      "rust|Rust toolchain",
    ]);
  });

  it("should describe a pack's contents", async () => {
    expect(await run(["pack-contents", "java"])).toEqual([
      "java",
      "intellij",
      "redhat.java (VS Code)",
      "+3 system packages",
    ]);
  });

  it("should leave VS Code extensions out with --no-vscode", async () => {
    expect(await run(["pack-contents", "java", "--no-vscode"])).toEqual([
      "java",
      "intellij",
      "+3 system packages",
    ]);
  });

  it("should count only the active package manager's packages", async () => {
    expect(
      await run(["--package-manager", "dnf", "pack-contents", "java", "--no-vscode"]),
    ).toEqual(["java", "intellij", "+1 system packages"]);
  });

  it("should print nothing for an empty pack", async () => {
    expect(await run(["pack-contents", "rust"])).toEqual([]);
  });

  it("should print the runtimes of the selected packs on one line", async () => {
    expect(await run(["--packs", "rust java", "runtimes"])).toEqual([
      "rust java maven gradle",
    ]);
  });

  it("should print the default packs' runtimes", async () => {
    expect(await run(["runtimes"])).toEqual([
      "java maven gradle node python go ruby",
    ]);
  });
});
