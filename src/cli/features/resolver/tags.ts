/**
 * Tag-based exclusion of manifest entries
 */

import type { ExecutionContext } from "@/cli/features/manifest/types.js";

export const SKIP_WSL_TAG = "@skip-wsl";

/**
 * Exclusion predicates by tag. Tags not listed here never exclude an entry.
 */
const EXCLUSION_PREDICATES: ReadonlyMap<
  string,
  (context: ExecutionContext) => boolean
> = new Map([[SKIP_WSL_TAG, (context: ExecutionContext) => context.isWSL]]);

/**
 * Check whether an entry should be left out of the resolution
 * @param args - Filter arguments
 * @param args.tags - The entry's tags
 * @param args.context - Execution context
 *
 * @returns True if any of the entry's tags excludes it in this context
 */
export const shouldSkip = (args: {
  tags: ReadonlyArray<string>;
  context: ExecutionContext;
}): boolean => {
  const { tags, context } = args;
  return tags.some((tag) => EXCLUSION_PREDICATES.get(tag)?.(context) === true);
};
