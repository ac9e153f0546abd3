/**
 * Errors raised while loading manifest documents
 */

/**
 * The base manifest does not exist. Nothing can be resolved.
 */
export class ConfigurationMissingError extends Error {
  readonly path: string;

  constructor(args: { path: string }) {
    super(`Package configuration not found: ${args.path}`);
    this.name = "ConfigurationMissingError";
    this.path = args.path;
  }
}

/**
 * A manifest document could not be read or parsed.
 * Fatal for the base manifest; an overlay in this state is skipped.
 */
export class ConfigurationMalformedError extends Error {
  readonly path: string;

  constructor(args: { path: string; reason: string }) {
    super(`Malformed package configuration ${args.path}: ${args.reason}`);
    this.name = "ConfigurationMalformedError";
    this.path = args.path;
  }
}
