/**
 * Tests for the tool-version command
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
core:
  custom:
    mise:
      version: 2024.12.0
  mise:
    node:
      version: "20"
packs:
  node:
    mise:
      node:
        version: "22"
      pnpm:
        version: "9"
  web:
    custom:
      pnpm:
        version: "8"
`;

describe("tool-version command", () => {
  let tempDir: string;
  let consoleLog: MockInstance<typeof console.log>;

  const run = async (args: Array<string>): Promise<Array<string>> => {
    await createProgram()
      .exitOverride()
      .parseAsync(["node", "packplan", "--dot-dir", tempDir, ...args]);
    return consoleLog.mock.calls.map((call) => String(call[0]));
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tool-version-test-"));
    const manifestDir = path.join(tempDir, ".config", "packplan");
    await fs.mkdir(manifestDir, { recursive: true });
    await fs.writeFile(path.join(manifestDir, "packages.yaml"), MANIFEST);

    vi.stubEnv("PACKPLAN_SELECTED_PACKS", "");
    vi.stubEnv("PACKPLAN_DEFAULT_PACKS", "");
    consoleLog = vi.spyOn(console, "log").mockImplementation(() => {
      // capture
    });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should print a core custom version", async () => {
    expect(await run(["tool-version", "mise"])).toEqual(["2024.12.0"]);
  });

  it("should prefer core over packs", async () => {
    expect(await run(["--packs", "node", "tool-version", "node"])).toEqual([
      "20",
    ]);
  });

  it("should search packs in selection order", async () => {
    expect(
      await run(["--packs", "web node", "tool-version", "pnpm"]),
    ).toEqual(["8"]);
    expect(
      await run(["--packs", "node web", "tool-version", "pnpm"]),
    ).toEqual(["8", "9"]);
  });

  it("should exit with status 1 and no output for an unknown tool", async () => {
    expect(await run(["--packs", "node", "tool-version", "deno"])).toEqual([]);
    expect(process.exitCode).toBe(1);
  });
});
