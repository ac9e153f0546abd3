/**
 * mise config.toml generation
 *
 * The generated file is a preamble (settings and env) followed by a [tools]
 * section built from the resolved mise entries.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import * as path from "path";

import type { MiseEntry } from "@/cli/features/manifest/types.js";

export const TOOLS_HEADER = "[tools]";

export const DEFAULT_MISE_PREAMBLE = `# Auto-generated from packages.yaml - DO NOT EDIT DIRECTLY
# To modify tools, edit packages.yaml and re-run setup

[settings]
experimental = true
legacy_version_file = false
asdf_compat = false
jobs = 6
yes = true
http_timeout = "90s"

[env]
HTTP_PROXY = "{{ get_env(name='HTTP_PROXY', default='') }}"
HTTPS_PROXY = "{{ get_env(name='HTTPS_PROXY', default='') }}"
NO_PROXY = "{{ get_env(name='NO_PROXY', default='') }}"
http_proxy = "{{ get_env(name='http_proxy', default='') }}"
https_proxy = "{{ get_env(name='https_proxy', default='') }}"
no_proxy = "{{ get_env(name='no_proxy', default='') }}"
PIP_INDEX_URL = "{{ get_env(name='PIP_INDEX_URL', default='') }}"
NPM_CONFIG_REGISTRY = "{{ get_env(name='NPM_CONFIG_REGISTRY', default='') }}"
RUBY_CONFIGURE_OPTS = "--with-openssl-dir=/usr"
`;

/**
 * Render one [tools] assignment
 * Keys containing `:` or `[` (backend-qualified keys such as
 * "aqua:mikefarah/yq") must be quoted; bare keys are written as-is.
 * @param args - Render arguments
 * @param args.toolKey - mise tool key
 * @param args.version - Requested version
 *
 * @returns The assignment line, without a trailing newline
 */
export const renderToolLine = (args: {
  toolKey: string;
  version: string;
}): string => {
  const { toolKey, version } = args;
  if (toolKey.includes(":") || toolKey.includes("[")) {
    return `"${toolKey}" = "${version}"`;
  }
  return `${toolKey} = "${version}"`;
};

/**
 * Extract the part of a template that precedes its [tools] section
 * @param args - Template arguments
 * @param args.text - Template file content
 *
 * @returns Every line before the [tools] header, each newline-terminated
 */
export const extractPreamble = (args: { text: string }): string => {
  const lines = args.text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const headerIndex = lines.indexOf(TOOLS_HEADER);
  const kept = headerIndex === -1 ? lines : lines.slice(0, headerIndex);
  return kept.map((line) => `${line}\n`).join("");
};

/**
 * Read the preamble for the generated config
 * @param args - Template arguments
 * @param args.templatePath - Path to a template config.toml (null for none)
 *
 * @returns The template's preamble if it exists, else the built-in default
 */
export const readPreamble = (args: { templatePath?: string | null }): string => {
  const { templatePath } = args;
  if (templatePath == null || !existsSync(templatePath)) {
    return DEFAULT_MISE_PREAMBLE;
  }
  return extractPreamble({ text: readFileSync(templatePath, "utf-8") });
};

/**
 * Render the full config.toml text
 * Entries with an empty key or version are left out.
 * @param args - Render arguments
 * @param args.preamble - Text placed before the [tools] section
 * @param args.entries - Resolved mise entries
 *
 * @returns The config file content
 */
export const renderMiseConfig = (args: {
  preamble: string;
  entries: ReadonlyArray<MiseEntry>;
}): string => {
  const { preamble, entries } = args;

  const toolLines = entries
    .filter((entry) => entry.toolKey !== "" && entry.version !== "")
    .map(
      (entry) =>
        `${renderToolLine({ toolKey: entry.toolKey, version: entry.version })}\n`,
    );

  return `${preamble}\n${TOOLS_HEADER}\n${toolLines.join("")}`;
};

/**
 * Write a generated config.toml
 * Not safe for concurrent writers to the same path.
 * @param args - Write arguments
 * @param args.outputPath - Destination file
 * @param args.templatePath - Optional template providing the preamble
 * @param args.entries - Resolved mise entries
 *
 * @returns The written content
 */
export const writeMiseConfig = (args: {
  outputPath: string;
  templatePath?: string | null;
  entries: ReadonlyArray<MiseEntry>;
}): string => {
  const { outputPath, templatePath, entries } = args;

  const content = renderMiseConfig({
    preamble: readPreamble({ templatePath }),
    entries,
  });

  mkdirSync(path.dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, content);
  return content;
};
